// src/index.ts

export * from './@types/index.js';
export { render } from './core/renderer/index.js';
export { formatRenderError } from './core/renderer/errors.js';
export { computeOutputHeight } from './core/renderer/lib/dimensions.js';
export { bucketIndex, normalizePalette, selectCharacter } from './core/renderer/lib/palette.js';
export { config, DEFAULT_PALETTE, SUPPORTED_KERNELS } from './config/index.js';
export { SharpImageProcessor } from './core/imageProcessing/strategies/SharpImageProcessor.js';
export { createLogger, NoopLogFacility, NoopLogger } from './utils/logging/logUtils.js';
