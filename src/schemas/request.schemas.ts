import { z } from "zod";
import { ImsUserState, MAX_LOCATION_AGE } from "../constants/ShDataConstant";

const nonBlank = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .refine((value) => value.trim().length > 0, `${label} must not be blank`);

const optionalFlag = z.boolean().nullish();

// Blank identifiers count as not provided
const optionalIdentifier = z
  .string()
  .nullish()
  .transform((value) => (value == null || value.trim().length === 0 ? undefined : value));

export const CALL_FORWARD_REASONS = [
  "unconditional",
  "notRegistered",
  "noAnswer",
  "busy",
  "notReachable",
] as const;

export type CallForwardReason = (typeof CALL_FORWARD_REASONS)[number];

export const subscriberProfileInputSchema = z
  .object({
    privateIdentity: nonBlank("Private identity"),
    publicIdentities: z
      .array(nonBlank("Public identity"), {
        required_error: "At least one public identity is required",
      })
      .min(1, "At least one public identity is required"),
    msisdn: z.string().nullish(),
    servingNode: optionalIdentifier,
    ageOfLocationInformation: z
      .number()
      .int()
      .min(0)
      .max(MAX_LOCATION_AGE, `Location age must not exceed ${MAX_LOCATION_AGE} minutes`)
      .nullish(),
    visitedPlmnId: optionalIdentifier,
    cscf: z.string().nullish(),
    userState: z.nativeEnum(ImsUserState, {
      errorMap: () => ({
        message: `User state must be one of ${Object.values(ImsUserState).join(", ")}`,
      }),
    }),
    barring: z
      .object({
        inbound: optionalFlag,
        outbound: optionalFlag,
      })
      .nullish(),
    callForwarding: z
      .object({
        enabled: optionalFlag,
        unconditional: optionalFlag,
        notRegistered: optionalFlag,
        noAnswer: optionalFlag,
        busy: optionalFlag,
        notReachable: optionalFlag,
        noAnswerTimeout: z.number().int().min(1).max(180).nullish(),
      })
      .nullish(),
  })
  .superRefine((input, ctx) => {
    const callForwarding = input.callForwarding;
    if (callForwarding && callForwarding.enabled !== true) {
      for (const reason of CALL_FORWARD_REASONS) {
        if (callForwarding[reason] === true) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["callForwarding", reason],
            message: `Call forward reason '${reason}' is set while call forwarding is disabled`,
          });
        }
      }
    }

    if (input.servingNode === undefined) {
      if (input.ageOfLocationInformation != null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["ageOfLocationInformation"],
          message: "Location age requires a serving node",
        });
      }
      if (input.visitedPlmnId !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["visitedPlmnId"],
          message: "Visited PLMN requires a serving node",
        });
      }
    }
  });

export type SubscriberProfileInput = z.input<typeof subscriberProfileInputSchema>;
export type ParsedSubscriberProfile = z.output<typeof subscriberProfileInputSchema>;

export const extensionsQuerySchema = z.object({
  extensions: z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? undefined
        : value
            .split(",")
            .map((name) => name.trim())
            .filter(Boolean),
    ),
});

export type ExtensionsQuery = z.output<typeof extensionsQuerySchema>;
