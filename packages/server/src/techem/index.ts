import type { Logger } from '../logger.js';
import { DecoderRegistry } from '../wmbus/registry.js';
import { createTechemDecoders } from './decoder.js';

export { TechemFrameDecoder, createTechemDecoders, validateLayout } from './decoder.js';
export { TECHEM, TECHEM_VARIANTS, type TechemVariant, type TechemLayout } from './variants.js';

/** Registry holding every known Techem variant, sealed. */
export function createTechemRegistry(logger?: Logger): DecoderRegistry {
  return new DecoderRegistry(createTechemDecoders(), { logger }).seal();
}
export { encodeTechemFrame, type TechemFrameFields } from './encoder.js';
