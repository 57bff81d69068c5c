import { spawn } from "child_process";
import { ExtractionError } from "./errors";
import type { PageImage, TextRecognizer } from "./types";

export interface TesseractOptions {
  binaryPath: string;
  lang: string;
  psm: number;
}

/** Rendered PDF pages carry their resolution; uploaded images leave it to tesseract. */
export function tesseractArgs(options: TesseractOptions, page: PageImage): string[] {
  const args = ["stdin", "stdout", "-l", options.lang, "--psm", String(options.psm)];
  if (page.dpi) {
    args.push("--dpi", String(page.dpi));
  }
  return args;
}

const ENGINE_MISSING_CODES = new Set(["ENOENT", "EACCES", "EPERM"]);
const LANGUAGE_DATA_ERROR = /(failed loading language|error opening data file|could not initialize tesseract)/i;
const IMAGE_READ_ERROR = /(pixReadMem|image file .* cannot be read|unsupported image type|error during processing)/i;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Drives the tesseract command-line engine over stdin/stdout, one page per process. */
export class TesseractRecognizer implements TextRecognizer {
  constructor(private readonly options: TesseractOptions) {}

  recognize(page: PageImage, signal?: AbortSignal): Promise<string> {
    const args = tesseractArgs(this.options, page);

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        return reject(signal.reason);
      }

      const proc = spawn(this.options.binaryPath, args, { stdio: ["pipe", "pipe", "pipe"] });

      const chunks: Buffer[] = [];
      proc.stdout.on("data", (chunk: Buffer) => chunks.push(Buffer.from(chunk)));

      let stderr = "";
      proc.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      let settled = false;
      const finish = (fn: () => void) => {
        if (!settled) {
          settled = true;
          signal?.removeEventListener("abort", onAbort);
          fn();
        }
      };

      const onAbort = () => {
        proc.kill("SIGKILL");
        finish(() => reject(signal?.reason));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      proc.on("error", (err) => {
        finish(() => {
          if (ENGINE_MISSING_CODES.has(errorCode(err) ?? "")) {
            reject(
              new ExtractionError(
                "ExtractionEngineUnavailable",
                `OCR engine '${this.options.binaryPath}' is not installed or not executable`,
                { cause: err }
              )
            );
            return;
          }
          reject(new ExtractionError("ExtractionEngineUnavailable", `OCR engine failed to start: ${err.message}`, { cause: err }));
        });
      });

      proc.on("close", (code) => {
        finish(() => {
          if (code === 0) {
            resolve(Buffer.concat(chunks).toString("utf8"));
            return;
          }
          const detail = stderr.trim();
          if (IMAGE_READ_ERROR.test(detail) && !LANGUAGE_DATA_ERROR.test(detail)) {
            reject(new ExtractionError("DocumentUnreadable", `OCR engine could not read page ${page.index + 1}: ${detail}`));
            return;
          }
          reject(new ExtractionError("ExtractionEngineUnavailable", `tesseract exited with code ${code}: ${detail}`));
        });
      });

      // EPIPE when the process dies before reading its input surfaces through 'close'.
      proc.stdin.on("error", () => undefined);
      proc.stdin.end(page.data);
    });
  }

  isAvailable(): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const proc = spawn(this.options.binaryPath, ["--version"], { stdio: ["ignore", "pipe", "pipe"] });
      let settled = false;
      const finish = (value: boolean) => {
        if (!settled) {
          settled = true;
          resolve(value);
        }
      };
      proc.on("error", () => finish(false));
      proc.on("close", (code) => finish(code === 0));
    });
  }
}
