import type { AssembledImage } from "../assembler/types.js";
import type { PublishedArtifact } from "../publish/types.js";
import type { Trigger } from "../trigger/trigger.js";

export const RELEASE_RECORD_VERSION = "1.0.0";

/** What a successful run published; written as release.json. */
export type ReleaseRecord = {
  schema_version: string;
  run_id: string;
  version: string;
  revision: string;
  trigger: Trigger;
  target: string;
  repository: string;
  digest: string;
  tags: string[];
  platforms: { platform: string; digest: string }[];
  context_hash: string;
  published_at: string;
};

export type ReleaseRecordInput = {
  run_id: string;
  version: string;
  revision: string;
  trigger: Trigger;
  context_hash: string;
  image: AssembledImage;
  artifact: PublishedArtifact;
};

export function buildReleaseRecord(input: ReleaseRecordInput, now: Date = new Date()): ReleaseRecord {
  return {
    schema_version: RELEASE_RECORD_VERSION,
    run_id: input.run_id,
    version: input.version,
    revision: input.revision,
    trigger: input.trigger,
    target: input.image.target,
    repository: input.artifact.repository,
    digest: input.artifact.digest,
    tags: input.artifact.tags,
    platforms: input.image.platforms.map((p) => ({ platform: p.platform, digest: p.digest })),
    context_hash: input.context_hash,
    published_at: now.toISOString(),
  };
}
