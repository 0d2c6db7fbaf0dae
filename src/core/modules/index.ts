export * from './types';
export * from './permissions';
export * from './Requirement';
export * from './ModuleManifest';
export * from './Dependencies';
export * from './Module';
export * from './Modules';
export * from './bundle';
