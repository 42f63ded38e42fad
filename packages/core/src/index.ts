export * from './errors/index.js';
export * from './schemas/marker-schemas.js';
export * from './markers/marker-vocabulary.js';
export { MarkerPanel, type PanelNote } from './markers/marker-panel.js';
export * from './classification/classification-types.js';
export * from './classification/guideline-profiles.js';
export { classify, type ClassifyOptions } from './classification/classifier.js';
export * from './classification/recommendations.js';
export * from './utils/type-guard-utils.js';
