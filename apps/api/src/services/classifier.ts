import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { ArtifactLoadError, ArtifactNotLoadedError, errorMessage } from "../lib/errors.js";
import type { SensorValues } from "../types/sensor.js";

export type Classification = {
  label: string;
  confidence: number | null;
};

/**
 * Boundary to the frozen water-quality model. Implementations must throw
 * ArtifactNotLoadedError when called before their artifact is available.
 * Callers must not assume concurrent calls are safe.
 */
export interface ClassifierPort {
  readonly isLoaded: boolean;
  classify(values: SensorValues): Promise<Classification>;
}

export const FEATURES = ["ph", "tds", "turbidity", "temperature"] as const;

const SplitNode = z.object({
  feature: z.number().int().min(0).max(FEATURES.length - 1),
  threshold: z.number().finite(),
  left: z.number().int().nonnegative(),
  right: z.number().int().nonnegative(),
});

const LeafNode = z.object({
  value: z.array(z.number().nonnegative()).min(1),
});

const TreeNode = z.union([SplitNode, LeafNode]);
type TreeNode = z.infer<typeof TreeNode>;

export const ForestArtifact = z
  .object({
    version: z.string().min(1),
    kind: z.literal("random_forest"),
    features: z.tuple([z.literal("ph"), z.literal("tds"), z.literal("turbidity"), z.literal("temperature")]),
    classes: z.array(z.string().min(1)).min(1),
    supportsProbability: z.boolean(),
    trees: z.array(z.object({ nodes: z.array(TreeNode).min(1) })).min(1),
  })
  .superRefine((artifact, ctx) => {
    if (new Set(artifact.classes).size !== artifact.classes.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["classes"], message: "class labels must be unique" });
    }
    artifact.trees.forEach((tree, t) => {
      tree.nodes.forEach((node, n) => {
        if ("value" in node) {
          if (node.value.length !== artifact.classes.length) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["trees", t, "nodes", n, "value"],
              message: `leaf must hold ${artifact.classes.length} class counts`,
            });
          }
          return;
        }
        // Children must point forward so evaluation always terminates.
        for (const child of [node.left, node.right]) {
          if (child <= n || child >= tree.nodes.length) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["trees", t, "nodes", n],
              message: `child index ${child} out of range`,
            });
          }
        }
      });
    });
  });
export type ForestArtifact = z.infer<typeof ForestArtifact>;

function leafProbabilities(nodes: TreeNode[], features: number[]): number[] {
  let node = nodes[0];
  while (!("value" in node)) {
    node = features[node.feature] <= node.threshold ? nodes[node.left] : nodes[node.right];
  }
  const counts = node.value;
  const total = counts.reduce((sum, v) => sum + v, 0);
  if (total === 0) return counts.map(() => 1 / counts.length);
  return counts.map((v) => v / total);
}

/**
 * Evaluates a random forest exported to JSON. The forest probability is the
 * mean of the per-tree leaf distributions; ties go to the first class.
 */
export function predictForest(artifact: ForestArtifact, values: SensorValues): Classification {
  const features = FEATURES.map((name) => values[name]);
  const sums = artifact.classes.map(() => 0);

  for (const tree of artifact.trees) {
    const probs = leafProbabilities(tree.nodes, features);
    probs.forEach((p, i) => {
      sums[i] += p;
    });
  }

  let best = 0;
  for (let i = 1; i < sums.length; i++) {
    if (sums[i] > sums[best]) best = i;
  }

  const confidence = artifact.supportsProbability
    ? Math.min(1, Math.max(0, sums[best] / artifact.trees.length))
    : null;

  return { label: artifact.classes[best], confidence };
}

export class ForestClassifier implements ClassifierPort {
  private artifact: ForestArtifact | null = null;

  constructor(private readonly artifactPath: string) {}

  get isLoaded(): boolean {
    return this.artifact !== null;
  }

  get labels(): readonly string[] {
    return this.artifact?.classes ?? [];
  }

  get version(): string | null {
    return this.artifact?.version ?? null;
  }

  async load(): Promise<void> {
    const resolved = path.resolve(this.artifactPath);
    console.log(`[Classifier] Loading artifact from ${resolved}`);

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(resolved, "utf8"));
    } catch (err) {
      throw new ArtifactLoadError(resolved, errorMessage(err), { cause: err });
    }

    const parsed = ForestArtifact.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new ArtifactLoadError(resolved, `${first.path.join(".")}: ${first.message}`, { cause: parsed.error });
    }

    this.artifact = parsed.data;
    console.log(
      `[Classifier] Loaded ${parsed.data.kind} v${parsed.data.version} (${parsed.data.trees.length} trees, labels: ${parsed.data.classes.join(", ")})`
    );
  }

  async classify(values: SensorValues): Promise<Classification> {
    if (!this.artifact) {
      throw new ArtifactNotLoadedError();
    }
    const result = predictForest(this.artifact, values);
    console.log(
      `[Classifier] ph=${values.ph} tds=${values.tds} turbidity=${values.turbidity} temperature=${values.temperature} -> ${result.label} (confidence: ${result.confidence ?? "n/a"})`
    );
    return result;
  }
}
