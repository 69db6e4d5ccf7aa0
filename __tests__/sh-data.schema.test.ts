import { describe, it, expect } from "vitest";
import { describeFieldPolicies } from "../src/builders/conditional-xml.renderer";
import { composeShDataSchema, ShDataExtension } from "../src/builders/sh-data.schema";
import { ValidationError } from "../src/errors/shData.errors";
import { FieldPresence } from "../src/types/shData.types";

describe("composeShDataSchema", () => {
  it("describes the base document policy table in document order", () => {
    expect(describeFieldPolicies(composeShDataSchema([]))).toEqual([
      { path: "Sh-Data", kind: "block", presence: null, conditional: false },
      { path: "Sh-Data/IMSPrivateUserIdentity", kind: "leaf", presence: "required", conditional: false },
      { path: "Sh-Data/PublicIdentifiers", kind: "block", presence: null, conditional: false },
      {
        path: "Sh-Data/PublicIdentifiers/IMSPublicIdentity",
        kind: "repeated",
        presence: "required",
        conditional: false,
      },
      { path: "Sh-Data/PublicIdentifiers/MSISDN", kind: "leaf", presence: "optional-omit", conditional: false },
      { path: "Sh-Data/Extension", kind: "block", presence: null, conditional: true },
      { path: "Sh-Data/Extension/EPSLocationInformation", kind: "block", presence: null, conditional: true },
      {
        path: "Sh-Data/Extension/EPSLocationInformation/MMEName",
        kind: "leaf",
        presence: "required",
        conditional: true,
      },
      {
        path: "Sh-Data/Extension/EPSLocationInformation/AgeOfLocationInformation",
        kind: "leaf",
        presence: "required",
        conditional: true,
      },
      {
        path: "Sh-Data/Extension/EPSLocationInformation/Extension",
        kind: "block",
        presence: null,
        conditional: true,
      },
      {
        path: "Sh-Data/Extension/EPSLocationInformation/Extension/VisitedPLMNID",
        kind: "leaf",
        presence: "required",
        conditional: true,
      },
      { path: "Sh-Data/Sh-IMS-Data", kind: "block", presence: null, conditional: false },
      {
        path: "Sh-Data/Sh-IMS-Data/S-CSCFName",
        kind: "leaf",
        presence: "optional-emit-empty",
        conditional: false,
      },
      { path: "Sh-Data/Sh-IMS-Data/IMSUserState", kind: "leaf", presence: "required", conditional: false },
    ]);
  });

  it("appends the service settings flags to Sh-IMS-Data as optional-omit fields", () => {
    const imsFields = describeFieldPolicies(composeShDataSchema(["service-settings"])).filter(
      (entry) => entry.path.startsWith("Sh-Data/Sh-IMS-Data/"),
    );

    expect(imsFields.map((entry) => entry.path.replace("Sh-Data/Sh-IMS-Data/", ""))).toEqual([
      "S-CSCFName",
      "IMSUserState",
      "InboundCommunicationBarred",
      "OutboundCommunicationBarred",
      "CallForwardingEnabled",
      "CallForwardUnconditional",
      "CallForwardNotRegistered",
      "CallForwardNoAnswer",
      "CallForwardBusy",
      "CallForwardNotReachable",
      "CallForwardNoReplyTimer",
    ]);
    expect(imsFields.slice(2).every((entry) => entry.presence === FieldPresence.OPTIONAL_OMIT)).toBe(true);
  });

  it("names the schema after its extensions and freezes it", () => {
    const schema = composeShDataSchema(["service-settings"]);

    expect(schema.name).toBe("base+service-settings");
    expect(Object.isFrozen(schema)).toBe(true);
  });

  it("does not alter the base document when extending it", () => {
    composeShDataSchema(["service-settings"]);

    expect(describeFieldPolicies(composeShDataSchema([]))).toHaveLength(14);
  });

  it("rejects unknown extensions", () => {
    expect(() => composeShDataSchema(["vendor-x"])).toThrow(ValidationError);
    expect(() => composeShDataSchema(["vendor-x"])).toThrow("Unknown schema extension 'vendor-x'");
  });

  it("rejects an extension listed twice", () => {
    expect(() => composeShDataSchema(["service-settings", "service-settings"])).toThrow(ValidationError);
    expect(() => composeShDataSchema(["service-settings", "service-settings"])).toThrow(
      "Schema extension 'service-settings' is listed more than once",
    );
  });

  it("rejects an extension that targets a missing block", () => {
    const stray: ShDataExtension = {
      name: "stray",
      description: "targets nothing",
      target: "Sh-Data/Sh-Repository-Data",
      nodes: [],
    };

    expect(() => composeShDataSchema(["stray"], new Map([["stray", stray]]))).toThrow(
      "Extension 'stray' targets unknown block 'Sh-Data/Sh-Repository-Data'",
    );
  });

  it("accepts extensions from a custom registry", () => {
    const repository: ShDataExtension = {
      name: "imsi",
      description: "Subscriber IMSI",
      target: "Sh-Data/PublicIdentifiers",
      nodes: [
        {
          kind: "leaf",
          name: "IMSI",
          presence: FieldPresence.OPTIONAL_OMIT,
          value: () => undefined,
        },
      ],
    };

    const paths = describeFieldPolicies(composeShDataSchema(["imsi"], new Map([["imsi", repository]]))).map(
      (entry) => entry.path,
    );
    expect(paths.slice(2, 6)).toEqual([
      "Sh-Data/PublicIdentifiers",
      "Sh-Data/PublicIdentifiers/IMSPublicIdentity",
      "Sh-Data/PublicIdentifiers/MSISDN",
      "Sh-Data/PublicIdentifiers/IMSI",
    ]);
  });
});
