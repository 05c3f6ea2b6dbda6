/**
 * Runs an external converter executable and reads its diagnostics log.
 *
 * Invocation: `<command> [args] -s <input> -t <output> -l <log> -ObjectType <KIND>`.
 * A non-zero exit, a timeout or a missing output file is a ConversionError.
 */
import { execFile } from "node:child_process";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import type { PrimaryConversion, PrimaryConverter } from "../collaborators.js";
import { ConversionError, errorMessage, isMissingFile } from "../errors.js";
import { withTempDir } from "../temp-dir.js";
import type { ObjectKind } from "../types.js";
import type { Logger } from "../../utils/logger.js";
import { parseDiagnostics } from "./diagnostics.js";

const execFileAsync = promisify(execFile);

const OBJECT_TYPE_FLAGS: Record<ObjectKind, string> = {
  Table: "TABLE",
  Procedure: "PROCEDURE",
  Function: "FUNCTION",
  Trigger: "TRIGGER",
  PackageMember: "PACKAGE",
};

export interface CommandConverterOptions {
  command: string;
  args?: string[];
  logger: Logger;
  timeoutMs?: number;
}

export class CommandConverter implements PrimaryConverter {
  readonly name: string;
  private readonly command: string;
  private readonly args: string[];
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: CommandConverterOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.name = `command:${options.command}`;
  }

  async convert(sourceText: string, kind: ObjectKind, signal?: AbortSignal): Promise<PrimaryConversion> {
    return withTempDir("schema-migrator-convert-", this.logger, async (dir) => {
      const input = join(dir, "input.sql");
      const output = join(dir, "output.sql");
      const logPath = join(dir, "convert.log");
      await writeFile(input, sourceText, "utf-8");

      const argv = [
        ...this.args,
        "-s", input,
        "-t", output,
        "-l", logPath,
        "-ObjectType", OBJECT_TYPE_FLAGS[kind],
      ];

      let stdout = "";
      try {
        const result = await execFileAsync(this.command, argv, {
          signal,
          timeout: this.timeoutMs,
          maxBuffer: 10 * 1024 * 1024,
        });
        stdout = result.stdout;
      } catch (err) {
        throw new ConversionError(`${this.command} failed: ${errorMessage(err)}`, { cause: err });
      }

      let text: string;
      try {
        text = await readFile(output, "utf-8");
      } catch (err) {
        throw new ConversionError(`${this.command} produced no output file`, { cause: err });
      }

      const log = await readFile(logPath, "utf-8").catch((err: unknown) => {
        if (isMissingFile(err)) return stdout;
        throw err;
      });

      const summary = parseDiagnostics(log);
      this.logger.debug(
        { command: this.command, errors: summary.errorCount, warnings: summary.warningCount },
        "External converter finished"
      );
      return { text, ...summary };
    });
  }
}
