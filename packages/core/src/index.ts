/**
 * pipeboard core - typed fields, steps, pipelines and content-addressed caching
 *
 * Core concepts:
 * - Classes declare ordered, typed, defaultable fields
 * - A step is configured through its fields and computes one output per input
 * - A pipeline chains the steps held by its tasks
 * - Same input and configuration → same cache key
 */

export {
  FieldTypeError,
  MandatoryFieldError,
  NoDataSourceError,
  NoDataTargetError,
  CheckpointError,
  StorageError,
  ConfigError,
} from './errors.js';

export { LOG_LEVELS, SETTINGS_ENV, settingsSchema, formatZodError, loadSettings, getSettings, configure, resetSettings } from './config.js';
export type { Settings } from './config.js';

export { createLogger, formatLogEntry, getLogger, setLogger } from './logger.js';
export type { Logger, LoggerOptions, LogLevel, LogSink } from './logger.js';

export type { KindTag, AnyConstructor, DType, DTypeSpec, AnyFunction, ValueOf, Kwargs, StorageMode } from './types.js';

export { KIND_TAGS, FUNCTION_KINDS, isDType, isFunctionLike, matchesDType, describeDType } from './dtype.js';

export { Registry, declareFields, registryOf } from './tracker.js';

export { Field, FieldCell, field, describeValue } from './field.js';
export type { FieldOptions } from './field.js';

export { FieldContainer, isPlainObject, splitArguments } from './fieldContainer.js';

export {
  DTYPE_NAMES,
  ndarray,
  isNDArray,
  isTypedArray,
  isArrayConvertible,
  dtypeName,
  asNDArray,
  typedArrayFromDType,
} from './ndarray.js';
export type { NDArray, TypedArray, DTypeName, ArrayConvertible } from './ndarray.js';

export { frexp, roundHalfEven, arrayIdentity, encodeForHash, contentHash } from './hashing.js';
export type { HashOptions, ArrayIdentity, Identifiable } from './hashing.js';

export {
  Storage,
  NoStorage,
  isStorable,
  contentKey,
  withStorage,
  storageOptionsSchema,
  parseStorageOptions,
} from './storage.js';
export type { Storable, Metadata, StorageOptions } from './storage.js';

export { AppendLogStorage } from './appendLogStorage.js';
export { HierarchicalStorage } from './hierarchicalStorage.js';
export type { EntryInfo } from './hierarchicalStorage.js';

export { Step, FunctionStep, functionStep, ensureStep, represent } from './step.js';
export type { StepFunction } from './step.js';

export { TaskField, TaskCell, task } from './task.js';
export type { TaskOptions } from './task.js';

export { Pipeline } from './pipeline.js';
