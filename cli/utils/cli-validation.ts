import { CLIExecutor } from './cli-executor';
import { logger } from './logger';

export interface CLIValidationResult {
  tool: string;
  installed: boolean;
  error?: string;
}

export interface ValidationSummary {
  allInstalled: boolean;
  results: CLIValidationResult[];
  missing: string[];
}

/** Install hints used when the config supplies none */
export const DEFAULT_INSTALL_HINTS: Record<string, string> = {
  ffmpeg: 'apt install ffmpeg | dnf install ffmpeg | pacman -S ffmpeg',
  dcraw: 'apt install dcraw | dnf install dcraw | pacman -S dcraw',
  'heif-convert': 'apt install libheif-examples | dnf install libheif-tools | pacman -S libheif',
};

export class MissingToolError extends Error {
  readonly code = 'MISSING_TOOL';

  constructor(public readonly tools: string[], hints: Record<string, string> = {}) {
    const lines = tools.map((tool) => {
      const hint = hints[tool] ?? DEFAULT_INSTALL_HINTS[tool];
      return hint ? `  - ${tool} (install: ${hint})` : `  - ${tool}`;
    });
    super(`Required tool${tools.length === 1 ? ' is' : 's are'} not installed:\n${lines.join('\n')}`);
    this.name = 'MissingToolError';
  }
}

/**
 * Utility for validating CLI tool installations
 */
export class CLIValidator {
  /**
   * Validate a single CLI tool
   */
  static async validateTool(toolName: string): Promise<CLIValidationResult> {
    const installed = await CLIExecutor.isInstalled(toolName);
    if (!installed) {
      return {
        tool: toolName,
        installed: false,
        error: `CLI tool '${toolName}' is not installed`,
      };
    }
    return { tool: toolName, installed: true };
  }

  /**
   * Validate a set of tools
   */
  static async validateTools(tools: string[]): Promise<ValidationSummary> {
    const results = await Promise.all(tools.map((tool) => this.validateTool(tool)));
    const missing = results.filter((r) => !r.installed).map((r) => r.tool);

    for (const result of results) {
      logger.debug(`Tool check: ${result.tool}`, { installed: result.installed });
    }

    return {
      allInstalled: missing.length === 0,
      results,
      missing,
    };
  }

  /**
   * Ensure every tool is on PATH
   * @throws MissingToolError naming each missing tool
   */
  static async requireTools(tools: string[], hints: Record<string, string> = {}): Promise<void> {
    const summary = await this.validateTools(tools);
    if (!summary.allInstalled) {
      throw new MissingToolError(summary.missing, hints);
    }
  }
}
