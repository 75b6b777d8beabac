import crypto from "node:crypto";

export function createRunId(now = new Date()): string {
  const suffix = crypto.randomBytes(3).toString("hex");
  return `mirror_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
