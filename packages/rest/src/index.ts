export * from './person';
export * from './http';
export * from './config';
export { createLevelLogger } from './logger';
export { createApp } from './app';
export type { App, AppOptions } from './app';
export { main, listen, closeServer } from './main';
export type { MainOptions, RunningApp } from './main';
