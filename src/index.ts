export { filterHtml, type FilterOptions } from "./application/filter/tag-filter";
export { stripTags, type StripTagsOptions } from "./infrastructure/text/html";
export { squeezeBlankLines } from "./infrastructure/text/normalize";
export {
  createAllowSet,
  EMPTY_ALLOW_SET,
  isAllowed,
  parseAllowList,
  type AllowSet,
} from "./domain/filter/allow-set";
export { readInput, type InputSource } from "./infrastructure/loaders/input-reader";
export {
  AppError,
  ConfigError,
  DecodeError,
  InputError,
  ValidationError,
  toAppError,
} from "./domain/common/errors";
