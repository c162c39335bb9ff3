import pLimit from "p-limit";
import type { SucuriRequest } from "./requests.js";

export const DEFAULT_CONCURRENCY = 8;

export type SubmitOutcome<T> =
  | { request: SucuriRequest; ok: true; response: T }
  | { request: SucuriRequest; ok: false; error: Error };

export type SubmitAllOptions<T> = {
  /** Requests in flight at once; 0 sends everything at once. */
  concurrency?: number;
  onOutcome?: (outcome: SubmitOutcome<T>) => void;
};

export type SubmitSummary<T> = {
  outcomes: SubmitOutcome<T>[];
  succeeded: number;
  failed: number;
};

// Fan out every request and wait for all of them. Failures become outcomes, never rejections.
export async function submitAll<T>(
  requests: SucuriRequest[],
  submit: (request: SucuriRequest) => Promise<T>,
  options: SubmitAllOptions<T> = {}
): Promise<SubmitSummary<T>> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const limit = pLimit(concurrency > 0 ? concurrency : Number.POSITIVE_INFINITY);

  const outcomes = await Promise.all(
    requests.map((request) =>
      limit(async (): Promise<SubmitOutcome<T>> => {
        let outcome: SubmitOutcome<T>;
        try {
          outcome = { request, ok: true, response: await submit(request) };
        } catch (err) {
          outcome = { request, ok: false, error: toError(err) };
        }
        options.onOutcome?.(outcome);
        return outcome;
      })
    )
  );

  const succeeded = outcomes.filter((outcome) => outcome.ok).length;
  return { outcomes, succeeded, failed: outcomes.length - succeeded };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
