import type { AssembledImage } from "../assembler/types.js";
import { PublishError } from "../errors.js";
import type { CommandRunner } from "../exec/runner.js";
import { redactSensitiveInfo, tailLines } from "../exec/security.js";
import { silentReporter, type Reporter } from "../output/reporter.js";
import { splitReference } from "./tags.js";
import type { PublishedArtifact, Publisher, RegistryCredentials } from "./types.js";

export type DockerPublisherOptions = {
  runner: CommandRunner;
  registry: string;
  credentials: RegistryCredentials | null;
  reporter?: Reporter;
};

function readDigest(raw: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("digest" in parsed)) return null;
  return typeof parsed.digest === "string" ? parsed.digest : null;
}

/**
 * Publishes through the docker CLI.
 *
 * Per-platform images are pushed to their staging repository and then referenced by the
 * digest the registry reports, so a staging tag moved by another run cannot leak in. The
 * release tags are written in one `imagetools create` call that points all of them at a
 * single manifest list. Nothing in the release repository changes if login or a staging
 * push fails.
 */
export class DockerPublisher implements Publisher {
  private readonly reporter: Reporter;

  constructor(private readonly opts: DockerPublisherOptions) {
    this.reporter = opts.reporter ?? silentReporter;
  }

  async push(image: AssembledImage, tags: string[]): Promise<PublishedArtifact> {
    if (tags.length === 0) throw new PublishError("No tags to publish");
    if (image.platforms.length === 0) throw new PublishError("Image has no platform builds");
    const { repository } = splitReference(tags[0]);
    const releaseRepositories = new Set(tags.map((t) => splitReference(t).repository));
    for (const platformImage of image.platforms) {
      if (releaseRepositories.has(splitReference(platformImage.ref).repository)) {
        throw new PublishError(`Staging image ${platformImage.ref} is in the release repository`);
      }
    }

    await this.login();

    const sources: string[] = [];
    for (const platformImage of image.platforms) {
      this.reporter.info("PUSH_STAGING", `Pushing ${platformImage.ref}`, { platform: platformImage.platform });
      await this.docker(["push", platformImage.ref], `push of ${platformImage.ref}`);
      const pushed = await this.inspectDigest(platformImage.ref);
      sources.push(`${splitReference(platformImage.ref).repository}@${pushed}`);
    }

    await this.docker(
      ["buildx", "imagetools", "create", ...tags.flatMap((t) => ["--tag", t]), ...sources],
      `manifest creation for ${tags.join(", ")}`,
    );

    const digests = new Map<string, string>();
    for (const ref of tags) {
      digests.set(ref, await this.inspectDigest(ref));
    }

    const distinct = new Set(digests.values());
    if (distinct.size !== 1) {
      const detail = [...digests].map(([ref, d]) => `${ref}=${d}`).join(", ");
      throw new PublishError(`Tags resolved to different digests: ${detail}`);
    }

    const [digest] = distinct;
    this.reporter.info("PUBLISHED", `Published ${tags.join(", ")} at ${digest}`, { digest, tags });
    return { repository, digest, tags: [...tags], platforms: image.platforms.map((p) => p.platform) };
  }

  private async inspectDigest(ref: string): Promise<string> {
    const out = await this.docker(["buildx", "imagetools", "inspect", ref, "--format", "{{json .Manifest}}"], `inspect of ${ref}`);
    const digest = readDigest(out);
    if (!digest) throw new PublishError(`Could not read digest of ${ref}`);
    return digest;
  }

  private async login(): Promise<void> {
    const creds = this.opts.credentials;
    if (!creds) throw new PublishError(`No credentials for registry ${this.opts.registry}`);

    const res = await this.opts.runner.run(
      "docker",
      ["login", this.opts.registry, "--username", creds.username, "--password-stdin"],
      { input: creds.token },
    );
    if (res.code !== 0) {
      throw new PublishError(
        `Registry authentication failed for ${this.opts.registry}: ${redactSensitiveInfo(tailLines(res.stderr), [creds.token])}`,
      );
    }
  }

  private async docker(args: string[], what: string): Promise<string> {
    const res = await this.opts.runner.run("docker", args);
    if (res.code !== 0) {
      const secrets = this.opts.credentials ? [this.opts.credentials.token] : [];
      throw new PublishError(`${what} failed (code ${res.code}): ${redactSensitiveInfo(tailLines(res.stderr), secrets)}`);
    }
    return res.stdout;
  }
}
