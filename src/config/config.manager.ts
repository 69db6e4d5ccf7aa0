/**
 * Configuration Manager - rendering settings derived from the environment
 */
import { isKnownExtension } from "../builders/sh-data.schema";
import { AssemblerOptions } from "../types/shData.types";
import logger from "../utils/logger";
import { config } from "./config";

export interface RenderingConfig extends AssemblerOptions {
  extensions: readonly string[];
}

export class ConfigManager {
  private static instance: ConfigManager;

  /**
   * Sh-Data rendering configuration
   * Access: ConfigManager.getInstance().rendering
   */
  public readonly rendering: RenderingConfig;

  /**
   * Private constructor (Singleton)
   */
  private constructor() {
    this.rendering = Object.freeze({
      extensions: Object.freeze([...config.SH_DATA_EXTENSIONS]),
      prettyPrint: config.SH_DATA_PRETTY_PRINT,
      indent: config.SH_DATA_INDENT,
      verifyWellFormed: config.SH_DATA_VERIFY_OUTPUT,
    });

    this.logConfiguration();
  }

  /**
   * Get singleton instance
   */
  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private logConfiguration(): void {
    logger.info("Sh-Data rendering configured", {
      extensions: this.rendering.extensions.length
        ? this.rendering.extensions.join(", ")
        : "(none)",
      prettyPrint: this.rendering.prettyPrint,
      indent: this.rendering.indent,
      verifyWellFormed: this.rendering.verifyWellFormed,
    });
  }

  /**
   * Validate configuration
   */
  public validate(): void {
    const errors: string[] = [];

    for (const name of this.rendering.extensions) {
      if (!isKnownExtension(name)) {
        errors.push(`SH_DATA_EXTENSIONS names unknown extension '${name}'`);
      }
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed: ${errors.join(", ")}`);
    }
  }
}
