export * from './taskPredicate';
export * from './filterOptions';
