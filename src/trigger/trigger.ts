/**
 * What started a release. The tag name is recorded, never parsed for a version.
 */
export type Trigger =
  | { kind: "tag"; ref: string }
  | { kind: "manual"; ref: string | null };

const TAG_PREFIX = "refs/tags/";

/** Trigger from CI variables: a tag push or a manual workflow dispatch. */
export function detectTrigger(env: NodeJS.ProcessEnv = process.env): Trigger | null {
  const event = env.GITHUB_EVENT_NAME;
  if (event === "push") {
    const ref = env.GITHUB_REF ?? "";
    if (!ref.startsWith(TAG_PREFIX) || ref.length === TAG_PREFIX.length) return null;
    return { kind: "tag", ref: ref.slice(TAG_PREFIX.length) };
  }
  if (event === "workflow_dispatch") {
    return { kind: "manual", ref: env.GITHUB_REF_NAME || null };
  }
  return null;
}

/** Explicit flags win over CI detection. */
export function resolveTrigger(
  opts: { tag?: string; manual?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): Trigger | null {
  if (opts.tag !== undefined) {
    return opts.tag.trim().length > 0 ? { kind: "tag", ref: opts.tag.trim() } : null;
  }
  if (opts.manual) return { kind: "manual", ref: null };
  return detectTrigger(env);
}

export function describeTrigger(trigger: Trigger): string {
  if (trigger.kind === "tag") return `tag ${trigger.ref}`;
  return trigger.ref ? `manual dispatch on ${trigger.ref}` : "manual dispatch";
}
