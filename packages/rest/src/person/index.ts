export * from './person';
export { PersonRepository } from './person-repository';
export type { PersonRepositoryOptions } from './person-repository';
