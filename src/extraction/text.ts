import type { PageImage, TextRecognizer } from "./types";

export const PAGE_SEPARATOR = "\n";

export interface RecognizeOptions {
  concurrency: number;
  signal?: AbortSignal;
}

/**
 * Recognises every page, at most `concurrency` at a time, and joins the
 * page texts in page order regardless of completion order.
 */
export async function recognizePages(
  pages: PageImage[],
  recognizer: TextRecognizer,
  options: RecognizeOptions
): Promise<string> {
  const texts: string[] = new Array<string>(pages.length).fill("");
  const workers = Math.max(1, Math.min(Math.trunc(options.concurrency) || 1, pages.length));
  let next = 0;
  let failed = false;

  const worker = async () => {
    while (!failed && next < pages.length) {
      const slot = next++;
      options.signal?.throwIfAborted();
      try {
        texts[slot] = await recognizer.recognize(pages[slot], options.signal);
      } catch (err) {
        // remaining pages are not started once one has failed
        failed = true;
        throw err;
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));
  return texts.join(PAGE_SEPARATOR);
}
