// @objfuzz/randomizer entry point
export {
  Randomizer,
  DEFAULT_CHARS,
  type SupplierWrapper,
  type IntRange,
} from './randomizer.js';
