import { ConditionalXmlRenderer, describeFieldPolicies } from "../builders/conditional-xml.renderer";
import { DocumentAssembler } from "../builders/document.assembler";
import { ConfigManager, RenderingConfig } from "../config/config.manager";
import { AssemblyError, ShDataError, ValidationError } from "../errors/shData.errors";
import {
  createSubscriberProfileRecord,
  SubscriberProfileRecord,
} from "../models/subscriber-profile.model";
import { FieldPolicyEntry } from "../types/shData.types";
import logger, { loggerUtils } from "../utils/logger";
import { ShDataSchemaCache } from "./schemaCache.service";

/**
 * Entry point for producing Sh-Data documents.
 *
 * record -> ConditionalXmlRenderer -> DocumentAssembler -> XML string
 *
 * Rendering is synchronous and keeps no per-call state, so one instance
 * serves concurrent requests.
 */
export class ShDataService {
  private static instance: ShDataService;

  private readonly assembler: DocumentAssembler;

  constructor(
    private readonly settings: RenderingConfig = ConfigManager.getInstance().rendering,
    private readonly schemaCache: ShDataSchemaCache = ShDataSchemaCache.getInstance(),
  ) {
    this.assembler = new DocumentAssembler({
      prettyPrint: settings.prettyPrint,
      indent: settings.indent,
      verifyWellFormed: settings.verifyWellFormed,
    });
  }

  public static getInstance(): ShDataService {
    if (!ShDataService.instance) {
      ShDataService.instance = new ShDataService();
    }
    return ShDataService.instance;
  }

  /**
   * Validate raw subscriber data and render it.
   */
  public render(input: unknown, extensions?: readonly string[]): string {
    let record: SubscriberProfileRecord;
    try {
      record = createSubscriberProfileRecord(input);
    } catch (error) {
      if (error instanceof ValidationError) {
        logger.warn("Subscriber profile rejected", {
          error: error.message,
          details: error.details,
        });
      }
      throw error;
    }
    return this.renderRecord(record, extensions);
  }

  public renderRecord(record: SubscriberProfileRecord, extensions?: readonly string[]): string {
    const started = Date.now();
    const selected = extensions ?? this.settings.extensions;

    try {
      const schema = this.schemaCache.getSchema(selected);
      const document = new ConditionalXmlRenderer(schema).render(record);
      const xml = this.assembler.assemble(document);

      loggerUtils.logRender(
        logger,
        record.identity.privateIdentity,
        schema.name,
        Buffer.byteLength(xml, "utf8"),
        Date.now() - started,
      );
      return xml;
    } catch (error) {
      this.report(error, record, selected);
      throw error;
    }
  }

  public getFieldPolicies(extensions?: readonly string[]): FieldPolicyEntry[] {
    return describeFieldPolicies(this.schemaCache.getSchema(extensions ?? this.settings.extensions));
  }

  private report(error: unknown, record: SubscriberProfileRecord, extensions: readonly string[]): void {
    const context = {
      privateIdentity: record.identity.privateIdentity,
      extensions: extensions.join(","),
    };

    if (error instanceof AssemblyError || !(error instanceof ShDataError)) {
      const failure = error instanceof Error ? error : new Error(String(error));
      loggerUtils.logError(logger, failure, {
        ...context,
        code: error instanceof AssemblyError ? error.code : undefined,
      });
      return;
    }

    logger.warn("Sh-Data rendering failed", {
      ...context,
      code: error.code,
      error: error.message,
      details: error.details,
    });
  }
}
