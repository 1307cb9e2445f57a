import type { LayerOp, StageDescriptor, StagePlan } from "./types.js";

const CONTINUATION = " \\\n    && ";

function execForm(argv: string[]): string {
  return `[${argv.map((a) => JSON.stringify(a)).join(", ")}]`;
}

function stageName(plan: StagePlan, index: number): string {
  return plan.stages[index]?.name ?? String(index);
}

function renderOp(plan: StagePlan, op: LayerOp): string | null {
  switch (op.op) {
    case "workdir":
      return `WORKDIR ${op.path}`;
    case "copy": {
      const from = op.fromStage === undefined ? "" : `--from=${stageName(plan, op.fromStage)} `;
      return `COPY ${from}${op.sources.join(" ")} ${op.dest}`;
    }
    case "run":
      return `RUN ${execForm(op.argv)}`;
    case "install":
      // index download, install and index removal share one layer
      if (op.packages.length === 0) return null;
      return `RUN ${["apt-get update", `apt-get install -y ${op.packages.join(" ")}`, "rm -rf /var/lib/apt/lists/*"].join(CONTINUATION)}`;
    case "create-user":
      return `RUN ${[
        `groupadd --gid ${op.gid} ${op.name}`,
        `useradd --create-home --home-dir ${op.home} --uid ${op.uid} --gid ${op.gid} ${op.name}`,
      ].join(CONTINUATION)}`;
    case "user":
      return `USER ${op.uid}:${op.gid}`;
  }
}

function renderStage(plan: StagePlan, stage: StageDescriptor): string {
  const from = "image" in stage.from ? stage.from.image : stageName(plan, stage.from.stage);
  const lines = [`FROM ${from} AS ${stage.name}`, ""];
  for (const op of stage.ops) {
    const line = renderOp(plan, op);
    if (line !== null) lines.push(line);
  }
  if (stage.entrypoint) lines.push(`ENTRYPOINT ${execForm(stage.entrypoint)}`);
  return lines.join("\n");
}

/** Render the arena as a multi-stage Dockerfile, stages in arena order. */
export function renderDockerfile(plan: StagePlan): string {
  return plan.stages.map((s) => renderStage(plan, s)).join("\n\n") + "\n";
}
