export { RequestBinder, type BinderOptions } from "@/binding/binder";
export { splitCollection } from "@/binding/collectionFormat";
export { coerceFragments, coerceGeneric, parseScalar, type Coercion } from "@/binding/coerce";
export { ConsumerRegistry, jsonConsumer, textConsumer, type Consumer } from "@/binding/consumers";
export {
  BinderConfigurationError,
  COLLECTION_FORMATS,
  LOCATIONS,
  SCHEMA_TYPES,
  type CollectionFormat,
  type ParameterDescriptor,
  type ParameterLocation,
  type ParameterMap,
  type SchemaDescriptor,
  type SchemaType,
} from "@/binding/descriptor";
export {
  BindingResult,
  type BindingError,
  type BindingErrorKind,
} from "@/binding/errors";
export type { BindRequest, RouteParams } from "@/binding/extractors";
export { parseMediaType, type MediaType } from "@/binding/mediaType";
export {
  CalendarDate,
  UploadedFile,
  type BoundValue,
  type JsonValue,
} from "@/binding/values";
