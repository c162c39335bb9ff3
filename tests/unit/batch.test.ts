import { describe, expect, it } from "vitest";
import { submitAll, type SubmitOutcome } from "../../packages/sucuri-client/src/batch.js";
import { whitelistIp, type SucuriRequest } from "../../packages/sucuri-client/src/requests.js";

function requestsFor(count: number): SucuriRequest[] {
  return Array.from({ length: count }, (_, index) => whitelistIp(`10.0.0.${index + 1}`));
}

describe("batch submission", () => {
  it("joins every request and keeps failures as outcomes", async () => {
    const seen: string[] = [];
    const summary = await submitAll(
      requestsFor(3),
      async (request) => {
        if (request.params.ip === "10.0.0.2") {
          throw new Error("rejected");
        }
        return request.params.ip;
      },
      { onOutcome: (outcome: SubmitOutcome<string | undefined>) => seen.push(outcome.request.description) }
    );

    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.outcomes.map((outcome) => outcome.ok)).toEqual([true, false, true]);
    const failed = summary.outcomes[1];
    expect(failed?.ok === false ? failed.error.message : null).toBe("rejected");
    expect(seen.sort()).toEqual(["whitelist IP 10.0.0.1", "whitelist IP 10.0.0.2", "whitelist IP 10.0.0.3"]);
  });

  it("wraps non-Error rejections", async () => {
    const summary = await submitAll(requestsFor(1), async () => {
      throw "nope";
    });
    const outcome = summary.outcomes[0];
    expect(outcome?.ok === false ? outcome.error.message : null).toBe("nope");
  });

  it("bounds the number of requests in flight", async () => {
    const track = () => {
      let inFlight = 0;
      let peak = 0;
      const submit = async (): Promise<string> => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight -= 1;
        return "ok";
      };
      return { submit, peak: () => peak };
    };

    const limited = track();
    await submitAll(requestsFor(5), limited.submit, { concurrency: 2 });
    expect(limited.peak()).toBe(2);

    const unbounded = track();
    await submitAll(requestsFor(5), unbounded.submit, { concurrency: 0 });
    expect(unbounded.peak()).toBe(5);
  });
});
