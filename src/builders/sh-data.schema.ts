import {
  SERVICE_SETTINGS_EXTENSION,
  ServiceSettingsElement,
  ShDataElement,
} from "../constants/ShDataConstant";
import { ValidationError } from "../errors/shData.errors";
import { SubscriberProfileRecord } from "../models/subscriber-profile.model";
import {
  BlockNodeSpec,
  DocumentSchema,
  FieldPresence,
  SchemaExtension,
  SchemaNode,
} from "../types/shData.types";

type ShNode = SchemaNode<SubscriberProfileRecord>;
type ShBlock = BlockNodeSpec<SubscriberProfileRecord>;

export type ShDataSchema = DocumentSchema<SubscriberProfileRecord>;
export type ShDataExtension = SchemaExtension<SubscriberProfileRecord>;

const leaf = (
  name: string,
  presence: FieldPresence,
  value: (record: SubscriberProfileRecord) => string | number | boolean | undefined,
): ShNode => ({ kind: "leaf", name, presence, value });

/**
 * Base Sh-Data document. Element order is significant to receiving
 * Application Servers and must not be rearranged.
 */
const BASE_ROOT: ShBlock = {
  kind: "block",
  name: ShDataElement.ROOT,
  children: [
    leaf(ShDataElement.PRIVATE_IDENTITY, FieldPresence.REQUIRED, (r) => r.identity.privateIdentity),
    {
      kind: "block",
      name: ShDataElement.PUBLIC_IDENTIFIERS,
      children: [
        {
          kind: "repeated",
          name: ShDataElement.PUBLIC_IDENTITY,
          presence: FieldPresence.REQUIRED,
          values: (r) => r.identity.publicIdentities,
        },
        leaf(ShDataElement.MSISDN, FieldPresence.OPTIONAL_OMIT, (r) => r.identity.msisdn),
      ],
    },
    {
      kind: "block",
      name: ShDataElement.EXTENSION,
      condition: (r) => r.location !== undefined,
      children: [
        {
          kind: "block",
          name: ShDataElement.EPS_LOCATION,
          children: [
            leaf(ShDataElement.MME_NAME, FieldPresence.REQUIRED, (r) => r.location?.servingNode),
            leaf(
              ShDataElement.LOCATION_AGE,
              FieldPresence.REQUIRED,
              (r) => r.location?.ageOfLocationInformation,
            ),
            {
              kind: "block",
              name: ShDataElement.EXTENSION,
              condition: (r) => r.location?.visitedPlmnId !== undefined,
              children: [
                leaf(ShDataElement.VISITED_PLMN, FieldPresence.REQUIRED, (r) => r.location?.visitedPlmnId),
              ],
            },
          ],
        },
      ],
    },
    {
      kind: "block",
      name: ShDataElement.IMS_DATA,
      children: [
        // S-CSCFName stays in the document (empty) while no S-CSCF is assigned
        leaf(ShDataElement.SCSCF_NAME, FieldPresence.OPTIONAL_EMIT_EMPTY, (r) => r.ims.scscfName),
        leaf(ShDataElement.IMS_USER_STATE, FieldPresence.REQUIRED, (r) => r.ims.userState),
      ],
    },
  ],
};

const serviceSettingsExtension: ShDataExtension = {
  name: SERVICE_SETTINGS_EXTENSION,
  description: "Non-3GPP barring and call-forwarding flags",
  target: `${ShDataElement.ROOT}/${ShDataElement.IMS_DATA}`,
  nodes: [
    leaf(ServiceSettingsElement.INBOUND_BARRED, FieldPresence.OPTIONAL_OMIT, (r) => r.serviceSettings.inboundBarred),
    leaf(ServiceSettingsElement.OUTBOUND_BARRED, FieldPresence.OPTIONAL_OMIT, (r) => r.serviceSettings.outboundBarred),
    leaf(ServiceSettingsElement.CF_ENABLED, FieldPresence.OPTIONAL_OMIT, (r) => r.serviceSettings.callForwarding.enabled),
    leaf(
      ServiceSettingsElement.CF_UNCONDITIONAL,
      FieldPresence.OPTIONAL_OMIT,
      (r) => r.serviceSettings.callForwarding.unconditional,
    ),
    leaf(
      ServiceSettingsElement.CF_NOT_REGISTERED,
      FieldPresence.OPTIONAL_OMIT,
      (r) => r.serviceSettings.callForwarding.notRegistered,
    ),
    leaf(ServiceSettingsElement.CF_NO_ANSWER, FieldPresence.OPTIONAL_OMIT, (r) => r.serviceSettings.callForwarding.noAnswer),
    leaf(ServiceSettingsElement.CF_BUSY, FieldPresence.OPTIONAL_OMIT, (r) => r.serviceSettings.callForwarding.busy),
    leaf(
      ServiceSettingsElement.CF_NOT_REACHABLE,
      FieldPresence.OPTIONAL_OMIT,
      (r) => r.serviceSettings.callForwarding.notReachable,
    ),
    leaf(
      ServiceSettingsElement.CF_NO_REPLY_TIMER,
      FieldPresence.OPTIONAL_OMIT,
      (r) => r.serviceSettings.callForwarding.noAnswerTimeout,
    ),
  ],
};

export const SH_DATA_EXTENSIONS: ReadonlyMap<string, ShDataExtension> = new Map([
  [serviceSettingsExtension.name, serviceSettingsExtension],
]);

export const isKnownExtension = (name: string): boolean => SH_DATA_EXTENSIONS.has(name);

const appendAt = (
  block: ShBlock,
  segments: readonly string[],
  extension: ShDataExtension,
): ShBlock => {
  const [head, ...rest] = segments;
  if (head !== block.name) {
    throw new ValidationError(
      `Extension '${extension.name}' targets unknown block '${extension.target}'`,
      [{ field: "extensions", message: `no block at ${extension.target}` }],
    );
  }

  if (rest.length === 0) {
    return { ...block, children: [...block.children, ...extension.nodes] };
  }

  // Only the first matching child block on each level is extended
  const index = block.children.findIndex(
    (child) => child.kind === "block" && child.name === rest[0],
  );
  const target = block.children[index];
  if (index < 0 || target === undefined || target.kind !== "block") {
    throw new ValidationError(
      `Extension '${extension.name}' targets unknown block '${extension.target}'`,
      [{ field: "extensions", message: `no block at ${extension.target}` }],
    );
  }

  const children = [...block.children];
  children[index] = appendAt(target, rest, extension);
  return { ...block, children };
};

/**
 * Compose the base document with the named extensions, in the order given.
 */
export const composeShDataSchema = (
  extensionNames: readonly string[],
  registry: ReadonlyMap<string, ShDataExtension> = SH_DATA_EXTENSIONS,
): ShDataSchema => {
  let root = BASE_ROOT;
  const applied = new Set<string>();

  for (const name of extensionNames) {
    if (applied.has(name)) {
      throw new ValidationError(`Schema extension '${name}' is listed more than once`, [
        { field: "extensions", message: `duplicate extension ${name}` },
      ]);
    }
    applied.add(name);

    const extension = registry.get(name);
    if (!extension) {
      throw new ValidationError(`Unknown schema extension '${name}'`, [
        { field: "extensions", message: `unknown extension ${name}` },
      ]);
    }
    root = appendAt(root, extension.target.split("/"), extension);
  }

  return Object.freeze({
    name: ["base", ...extensionNames].join("+"),
    root,
  });
};
