import type { AssembledImage } from "../assembler/types.js";
import { computeManifestDigest } from "../assembler/digest.js";
import { PublishError } from "../errors.js";
import { splitReference } from "./tags.js";
import type { PublishedArtifact, Publisher } from "./types.js";

type ManifestList = {
  digest: string;
  platforms: { platform: string; digest: string }[];
};

/**
 * In-process registry. Every tag of a push is validated before any is written,
 * and all of them are written to the same manifest. Later pushes win.
 */
export class MemoryRegistry implements Publisher {
  private readonly tagIndex = new Map<string, string>();
  private readonly manifests = new Map<string, ManifestList>();
  private pushCount = 0;

  async push(image: AssembledImage, tags: string[]): Promise<PublishedArtifact> {
    if (tags.length === 0) throw new PublishError("No tags to publish");
    if (image.platforms.length === 0) throw new PublishError("Image has no platform builds");

    const parsed = tags.map(splitReference);
    const repository = parsed[0].repository;

    const platforms = image.platforms.map((p) => ({ platform: p.platform, digest: p.digest }));
    const digest = computeManifestDigest(platforms);
    this.manifests.set(digest, { digest, platforms });

    for (const ref of tags) this.tagIndex.set(ref, digest);
    this.pushCount++;

    return { repository, digest, tags: [...tags], platforms: platforms.map((p) => p.platform) };
  }

  /** Digest a reference currently points at. */
  resolve(ref: string): string | undefined {
    return this.tagIndex.get(ref);
  }

  /** Tags of a repository, sorted. */
  tags(repository: string): string[] {
    return [...this.tagIndex.keys()]
      .filter((ref) => splitReference(ref).repository === repository)
      .map((ref) => splitReference(ref).tag)
      .sort();
  }

  manifest(digest: string): ManifestList | undefined {
    return this.manifests.get(digest);
  }

  get pushes(): number {
    return this.pushCount;
  }
}
