import fs from "node:fs";
import type { Trigger } from "../trigger/trigger.js";

/**
 * Generate a release run ID.
 * Format: {tag|manual}-{sha_7}-{YYYYMMDD}-{seq}
 */
export function generateRunId(trigger: Trigger, sha: string, runsDir: string, now: Date = new Date()): string {
  const label = trigger.kind === "tag" ? trigger.ref : "manual";
  const safeLabel = label.replace(/[^a-zA-Z0-9_-]/g, "-").slice(0, 30);
  const sha7 = sha.slice(0, 7);
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  const seq = getNextSeq(runsDir, `${safeLabel}-${sha7}-${date}-`);
  return `${safeLabel}-${sha7}-${date}-${seq}`;
}

function getNextSeq(runsDir: string, prefix: string): string {
  if (!fs.existsSync(runsDir)) return "001";

  const entries = fs.readdirSync(runsDir, { withFileTypes: true });
  let maxSeq = 0;

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    if (!entry.name.startsWith(prefix)) continue;
    const num = parseInt(entry.name.slice(prefix.length), 10);
    if (!isNaN(num) && num > maxSeq) maxSeq = num;
  }

  return String(maxSeq + 1).padStart(3, "0");
}
