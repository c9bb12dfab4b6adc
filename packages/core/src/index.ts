// @schemastat/core public API
export * from './stats/index';
