import type { AssembledImage } from "../assembler/types.js";

export type PublishedArtifact = {
  repository: string;
  /** Digest every tag resolves to after the push. */
  digest: string;
  /** Full references, e.g. "example/app:latest". */
  tags: string[];
  platforms: string[];
};

export type RegistryCredentials = {
  username: string;
  token: string;
};

/**
 * Registry capability injected into the release. Either every tag lands on the
 * same content or the push fails.
 */
export interface Publisher {
  push(image: AssembledImage, tags: string[]): Promise<PublishedArtifact>;
}
