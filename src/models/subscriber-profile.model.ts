/**
 * Subscriber Profile Record
 * Input data for one Sh-Data rendering: identities, EPS location,
 * IMS serving state and supplementary service settings.
 * Built fresh per request and immutable once constructed.
 */
import { DEFAULT_LOCATION_AGE, ImsUserState } from "../constants/ShDataConstant";
import { ValidationError } from "../errors/shData.errors";
import {
  ParsedSubscriberProfile,
  subscriberProfileInputSchema,
} from "../schemas/request.schemas";

// ============================================================================
// RECORD
// ============================================================================

export interface IdentityInfo {
  readonly privateIdentity: string;
  readonly publicIdentities: readonly string[];
  readonly msisdn?: string;
}

// Present only while the subscriber is attached to a serving MME
export interface EpsLocation {
  readonly servingNode: string;
  readonly ageOfLocationInformation: number;
  readonly visitedPlmnId?: string;
}

export interface ImsServingState {
  readonly scscfName?: string;
  readonly userState: ImsUserState;
}

export interface CallForwardingSettings {
  readonly enabled?: boolean;
  readonly unconditional?: boolean;
  readonly notRegistered?: boolean;
  readonly noAnswer?: boolean;
  readonly busy?: boolean;
  readonly notReachable?: boolean;
  readonly noAnswerTimeout?: number; // seconds
}

export interface ServiceSettings {
  readonly inboundBarred?: boolean;
  readonly outboundBarred?: boolean;
  readonly callForwarding: CallForwardingSettings;
}

export interface SubscriberProfileRecord {
  readonly identity: IdentityInfo;
  readonly location?: EpsLocation;
  readonly ims: ImsServingState;
  readonly serviceSettings: ServiceSettings;
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

const present = <T>(value: T | null | undefined): T | undefined =>
  value === null ? undefined : value;

const freezeDeep = <T>(value: T): T => {
  if (value !== null && typeof value === "object") {
    for (const nested of Object.values(value)) {
      freezeDeep(nested);
    }
    Object.freeze(value);
  }
  return value;
};

/**
 * Validate untyped input and build a frozen SubscriberProfileRecord.
 * Throws ValidationError listing every problem found.
 */
export const createSubscriberProfileRecord = (
  input: unknown,
): SubscriberProfileRecord => {
  const result = subscriberProfileInputSchema.safeParse(input);

  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      field: issue.path.join(".") || "record",
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid subscriber profile: ${details.map((d) => `${d.field}: ${d.message}`).join("; ")}`,
      details,
    );
  }

  return freezeDeep(toRecord(result.data));
};

const toRecord = (input: ParsedSubscriberProfile): SubscriberProfileRecord => {
  const servingNode = present(input.servingNode);
  const callForwarding = input.callForwarding;

  return {
    identity: {
      privateIdentity: input.privateIdentity,
      publicIdentities: [...input.publicIdentities],
      msisdn: present(input.msisdn),
    },
    location:
      servingNode === undefined
        ? undefined
        : {
            servingNode,
            ageOfLocationInformation:
              present(input.ageOfLocationInformation) ?? DEFAULT_LOCATION_AGE,
            visitedPlmnId: present(input.visitedPlmnId),
          },
    ims: {
      scscfName: present(input.cscf),
      userState: input.userState,
    },
    serviceSettings: {
      inboundBarred: present(input.barring?.inbound),
      outboundBarred: present(input.barring?.outbound),
      callForwarding: {
        enabled: present(callForwarding?.enabled),
        unconditional: present(callForwarding?.unconditional),
        notRegistered: present(callForwarding?.notRegistered),
        noAnswer: present(callForwarding?.noAnswer),
        busy: present(callForwarding?.busy),
        notReachable: present(callForwarding?.notReachable),
        noAnswerTimeout: present(callForwarding?.noAnswerTimeout),
      },
    },
  };
};
