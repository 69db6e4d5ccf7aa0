export { ConditionalXmlRenderer, describeFieldPolicies } from "./builders/conditional-xml.renderer";
export { DocumentAssembler } from "./builders/document.assembler";
export {
  composeShDataSchema,
  isKnownExtension,
  SH_DATA_EXTENSIONS,
} from "./builders/sh-data.schema";
export type { ShDataExtension, ShDataSchema } from "./builders/sh-data.schema";
export {
  ImsUserState,
  SERVICE_SETTINGS_EXTENSION,
  ServiceSettingsElement,
  ShDataElement,
} from "./constants/ShDataConstant";
export {
  AssemblyError,
  EncodingError,
  ShDataError,
  ValidationError,
} from "./errors/shData.errors";
export type { ErrorDetail } from "./errors/shData.errors";
export { createSubscriberProfileRecord } from "./models/subscriber-profile.model";
export type {
  CallForwardingSettings,
  EpsLocation,
  IdentityInfo,
  ImsServingState,
  ServiceSettings,
  SubscriberProfileRecord,
} from "./models/subscriber-profile.model";
export type { SubscriberProfileInput } from "./schemas/request.schemas";
export { ShDataSchemaCache } from "./services/schemaCache.service";
export type { SchemaCacheStats } from "./services/schemaCache.service";
export { ShDataService } from "./services/shData.service";
export { FieldPresence } from "./types/shData.types";
export type {
  AssemblerOptions,
  DocumentSchema,
  FieldPolicyEntry,
  RenderedDocument,
  RenderedElement,
  SchemaExtension,
  SchemaNode,
  XmlScalar,
} from "./types/shData.types";
export { assertXmlChars, EscapedText, escapeXmlValue } from "./utils/valueEscaper";
