import type { HealthProbe, ProbeOutcome } from "../health/types.js";

type Responder = (attempt: number) => ProbeOutcome;

const REFUSED: ProbeOutcome = { ok: false, error: "connect ECONNREFUSED" };

/** Answers health probes per URL; unknown URLs are refused. */
export class FakeHealthProbe implements HealthProbe {
  readonly calls: string[] = [];
  private readonly responders = new Map<string, Responder>();

  respond(url: string, responder: Responder | ProbeOutcome): this {
    this.responders.set(url, typeof responder === "function" ? responder : () => responder);
    return this;
  }

  healthy(url: string): this {
    return this.respond(url, { ok: true, status: 200 });
  }

  refuse(url: string): this {
    return this.respond(url, REFUSED);
  }

  attemptsFor(url: string): number {
    return this.calls.filter((call) => call === url).length;
  }

  async probe(url: string): Promise<ProbeOutcome> {
    const attempt = this.attemptsFor(url);
    this.calls.push(url);
    const responder = this.responders.get(url);
    return responder ? responder(attempt) : REFUSED;
  }
}
