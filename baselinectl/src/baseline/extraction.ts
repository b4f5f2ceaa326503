import { execFile } from "node:child_process";
import path from "node:path";
import { promisify } from "node:util";
import { ExtractionFailedError } from "../errors.js";
import { computeSha256 } from "./checksum.js";

const pExecFile = promisify(execFile);

const MODEL_EXTENSIONS = [".stp", ".step"];

/** Produces a baseline-shaped document from a native model file. */
export interface GeometryExtractionService {
  extract(modelPath: string): Promise<unknown>;
}

export type CommandExtractionOptions = {
  command: string;
  args?: string[];
  timeoutMs?: number;
};

export function isModelFile(ref: string): boolean {
  return MODEL_EXTENSIONS.includes(path.extname(ref).toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    const stderr = "stderr" in err && typeof err.stderr === "string" ? err.stderr.trim() : "";
    return stderr ? `${err.message.split("\n")[0]}: ${stderr}` : err.message;
  }
  return String(err);
}

/**
 * Runs an external extractor as `command ...args <modelPath>` and reads one
 * baseline JSON document from its stdout.
 *
 * `file` and `checksum` are filled in from the model file when the extractor
 * leaves them out.
 */
export class CommandExtractionService implements GeometryExtractionService {
  private readonly args: string[];
  private readonly timeoutMs: number;

  constructor(private readonly opts: CommandExtractionOptions) {
    this.args = opts.args ?? [];
    this.timeoutMs = opts.timeoutMs ?? 300000;
  }

  async extract(modelPath: string): Promise<unknown> {
    let stdout: string;
    try {
      ({ stdout } = await pExecFile(this.opts.command, [...this.args, modelPath], {
        timeout: this.timeoutMs,
        maxBuffer: 256 * 1024 * 1024,
      }));
    } catch (err) {
      throw new ExtractionFailedError(modelPath, describeFailure(err), err);
    }

    let doc: unknown;
    try {
      doc = JSON.parse(stdout);
    } catch (err) {
      throw new ExtractionFailedError(modelPath, "extractor output is not valid JSON", err);
    }
    if (!isRecord(doc)) {
      throw new ExtractionFailedError(modelPath, "extractor output is not a JSON object");
    }

    return {
      ...doc,
      file: typeof doc.file === "string" ? doc.file : path.basename(modelPath),
      checksum: typeof doc.checksum === "string" ? doc.checksum : computeSha256(modelPath),
    };
  }
}
