export { createSmtpSender, createDigestSender } from "./sender";
export type { SendResult, SendDigestFn } from "./sender";

export { formatSubject, formatDigestDate } from "./subject";

export { runDigestCycle, exitCodeFor } from "./orchestrator";
export type { RunDeps, RunOutcome } from "./orchestrator";
