export enum PlanNodeKind {
  // Leaves
  TableScan = 'TableScan',
  Values = 'Values',
  TableFunctionScan = 'TableFunctionScan',

  // Single-input relational operators
  Filter = 'Filter',
  Project = 'Project',
  Aggregate = 'Aggregate',
  Sort = 'Sort',
  Exchange = 'Exchange',
  Match = 'Match',      // MATCH_RECOGNIZE

  // Multi-input relational operators
  Join = 'Join',
  Correlate = 'Correlate',
  Union = 'Union',
  Intersect = 'Intersect',
  Minus = 'Minus',

  // Anything the front end produces that has no dedicated kind here
  Other = 'Other',
}
