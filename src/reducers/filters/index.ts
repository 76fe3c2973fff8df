export * from './filtersReducer';
