export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * IMS user state as carried in Sh-IMS-Data/IMSUserState (3GPP TS 29.328).
 */
export enum ImsUserState {
  NOT_REGISTERED = "NOT_REGISTERED",
  REGISTERED = "REGISTERED",
  REGISTERED_UNREG_SERVICES = "REGISTERED_UNREG_SERVICES",
  AUTHENTICATION_PENDING = "AUTHENTICATION_PENDING",
}

export const ShDataElement = {
  ROOT: "Sh-Data",
  PRIVATE_IDENTITY: "IMSPrivateUserIdentity",
  PUBLIC_IDENTIFIERS: "PublicIdentifiers",
  PUBLIC_IDENTITY: "IMSPublicIdentity",
  MSISDN: "MSISDN",
  EXTENSION: "Extension",
  EPS_LOCATION: "EPSLocationInformation",
  MME_NAME: "MMEName",
  LOCATION_AGE: "AgeOfLocationInformation",
  VISITED_PLMN: "VisitedPLMNID",
  IMS_DATA: "Sh-IMS-Data",
  SCSCF_NAME: "S-CSCFName",
  IMS_USER_STATE: "IMSUserState",
} as const;

// Non-3GPP supplementary service elements contributed by the service-settings extension
export const ServiceSettingsElement = {
  INBOUND_BARRED: "InboundCommunicationBarred",
  OUTBOUND_BARRED: "OutboundCommunicationBarred",
  CF_ENABLED: "CallForwardingEnabled",
  CF_UNCONDITIONAL: "CallForwardUnconditional",
  CF_NOT_REGISTERED: "CallForwardNotRegistered",
  CF_NO_ANSWER: "CallForwardNoAnswer",
  CF_BUSY: "CallForwardBusy",
  CF_NOT_REACHABLE: "CallForwardNotReachable",
  CF_NO_REPLY_TIMER: "CallForwardNoReplyTimer",
} as const;

export const SERVICE_SETTINGS_EXTENSION = "service-settings";

export const DEFAULT_LOCATION_AGE = 0;

// tAgeOfLocationInformation upper bound, in minutes
export const MAX_LOCATION_AGE = 32767;

export const SCHEMA_CACHE_PREFIX = "schema:";
