export * from './HierarchyBuilder';
export * from './placement';
export * from './records';
export * from './references';
export * from './RegionTemplate';
export * from './ScopeIndex';
