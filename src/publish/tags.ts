import { PublishError } from "../errors.js";
import type { ImagesmithConfig } from "../types/config.js";
import type { RegistryCredentials } from "./types.js";

export const DEFAULT_FLOATING_TAG = "latest";

const TAG_RE = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;

export function isValidTag(tag: string): boolean {
  return TAG_RE.test(tag);
}

/** Split "repo:tag" on the last colon after the last slash. */
export function splitReference(ref: string): { repository: string; tag: string } {
  const slash = ref.lastIndexOf("/");
  const colon = ref.lastIndexOf(":");
  if (colon <= slash) {
    throw new PublishError(`Reference has no tag: ${ref}`);
  }
  const repository = ref.slice(0, colon);
  const tag = ref.slice(colon + 1);
  if (repository.length === 0 || !isValidTag(tag)) {
    throw new PublishError(`Invalid image reference: ${ref}`);
  }
  return { repository, tag };
}

/** The floating tag and the version tag, floating first, duplicates collapsed. */
export function releaseTags(repository: string, version: string, floatingTag: string = DEFAULT_FLOATING_TAG): string[] {
  return [...new Set([`${repository}:${floatingTag}`, `${repository}:${version}`])];
}

/** Staging repository for a config; never the release repository itself. */
export function stagingRepository(config: Pick<ImagesmithConfig, "image" | "release">): string {
  return config.release.staging_repository ?? `${config.image.name}-staging`;
}

/**
 * Registry credentials from the environment: REGISTRY_USERNAME / REGISTRY_TOKEN,
 * falling back to DOCKERHUB_USERNAME / DOCKERHUB_TOKEN.
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): RegistryCredentials | null {
  const username = env.REGISTRY_USERNAME ?? env.DOCKERHUB_USERNAME;
  const token = env.REGISTRY_TOKEN ?? env.DOCKERHUB_TOKEN;
  if (!username || !token) return null;
  return { username, token };
}
