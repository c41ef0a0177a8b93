export * from './types/osm.js';
export * from './utils/validators.js';
