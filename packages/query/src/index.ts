export * from './predicates';
export * from './statements';
