export * from './collection/collection';
export * from './collection/dot-dict';
export * from './embedded/containers';
export * from './embedded/embedded';
export * from './embedded/types';
export * from './errors';
export * from './password/hasher';
export * from './password/password';
export * from './property/pipeline';
export * from './property/property';
export * from './property/types';
export * from './reference/reference';
export * from './reference/resolver';
export * from './reference/types';
export * from './scalar/datetime';
export * from './scalar/enum';
export * from './scalar/scalar';
export * from './schema/schema';
