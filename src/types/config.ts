/** Configuration types: layered config system. */
export type ReleaseTarget = "base" | "rootless";

export type ImageConfig = {
  /** Repository name without tag, e.g. "example/app". */
  name: string;
  platforms: string[];
};

export type ManifestConfig = {
  path: string;
  scan_lines: number;
  key: string;
  strict: boolean;
};

export type ContextConfig = {
  root: string;
  lock_files: string[];
  source_dirs: string[];
  asset_dirs: string[];
  ignore: string[];
};

export type BuilderStageConfig = {
  image: string;
  workdir: string;
  command: string[];
  artifact: string;
};

export type BaseStageConfig = {
  image: string;
  install_dir: string;
  packages: string[];
};

export type RootlessStageConfig = {
  user: string;
  uid: number;
  gid: number;
};

export type StagesConfig = {
  builder: BuilderStageConfig;
  base: BaseStageConfig;
  rootless: RootlessStageConfig;
};

export type ReleaseConfig = {
  registry: string;
  floating_tag: string;
  target: ReleaseTarget;
  /** Repository per-platform images are pushed to before the release tags are written. Default `{image.name}-staging`. */
  staging_repository?: string;
};

export type ImagesmithConfig = {
  schema_version: string;
  runs_dir: string;
  image: ImageConfig;
  manifest: ManifestConfig;
  context: ContextConfig;
  stages: StagesConfig;
  release: ReleaseConfig;
};
