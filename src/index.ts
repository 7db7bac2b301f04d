export { SuiteQLClient, Collection } from './client.js';
export type { Column } from './client.js';
export { attr, string, number, boolean, date, literal, reference, isVisibleIn } from './entity/attributes.js';
export type {
  Attribute,
  AttributeKind,
  AttributeMap,
  AttributeOptions,
  Dialect,
  FieldContext,
  LiteralAttribute,
  ReferenceAttribute,
} from './entity/attributes.js';
export { Entity, defineEntity } from './entity/entity.js';
export type { AnyEntity, EntityDefinition, EntityExtension, EntityRecord, FieldMap, RecordOf } from './entity/entity.js';
export { FieldDescriptor } from './entity/field.js';
export { And, Or, Comparison, and, or, formatDate, OPERATOR_TOKENS } from './query/operators.js';
export type { CompareValue, Condition, Operator, ValueType } from './query/operators.js';
export { SuiteQLSelect, SuiteQLJoin, SuiteQLWhere } from './query/builder.js';
export { compileRestFilter } from './query/rest-filter.js';
export { paginate, MAX_PAGE_SIZE } from './query/paginator.js';
export type { PageFetcher, PaginateOptions } from './query/paginator.js';
export { EXTRA_POLICIES } from './query/types.js';
export type { ExtraPolicy, JoinDirection, JoinKind, QueryStage } from './query/types.js';
export type { ResponseShape, ShapeField, ShapeJoin } from './materialize/shape.js';
export { configFromEnv, parseSettings, DEFAULT_PAGE_SIZE, DEFAULT_LOG_LEVEL, LOG_LEVELS } from './config.js';
export type { ClientConfig, LogLevel, Settings } from './config.js';
export type { ExecOptions, QueryPage, QueryResult, QueryTransport, TransportOptions } from './types.js';
export {
  ConfigurationError,
  UnsupportedOperatorError,
  UsageError,
  MismatchConditionsError,
  InvalidStageError,
  InvalidResponseError,
  DecodeError,
  QueryTransportError,
} from './errors.js';
