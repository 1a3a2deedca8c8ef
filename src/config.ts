import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors";

export const sampleSchema = z.object({
  inputs: z.array(z.number()).min(1),
  targets: z.array(z.number()).min(1),
});

export type Sample = z.infer<typeof sampleSchema>;

/** Learns `a + b` from five pairs. */
export const DEFAULT_DATASET: Sample[] = [
  { inputs: [5, 5], targets: [10] },
  { inputs: [4, 3], targets: [7] },
  { inputs: [10, 3], targets: [13] },
  { inputs: [-15, 3], targets: [-12] },
  { inputs: [-5, 3], targets: [-2] },
];

export const trainingConfigSchema = z.object({
  layers: z.array(z.number().int().min(1)).min(2).default([2, 1]),
  iterations: z.number().int().min(1).default(1000),
  learningRate: z.number().positive().default(1e-4),
  seed: z.number().int().optional(),
  hiddenActivation: z.enum(["linear", "relu"]).default("linear"),
  logEvery: z.number().int().min(0).default(100),
  dataset: z.array(sampleSchema).min(1).default(DEFAULT_DATASET),
}).superRefine((config, ctx) => {
  const inputs = config.layers[0];
  const outputs = config.layers[config.layers.length - 1];
  config.dataset.forEach((sample, i) => {
    if (sample.inputs.length !== inputs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["dataset", i, "inputs"],
        message: `expected ${inputs} values to match layers [${config.layers.join(", ")}], got ${sample.inputs.length}`,
      });
    }
    if (sample.targets.length !== outputs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["dataset", i, "targets"],
        message: `expected ${outputs} values to match layers [${config.layers.join(", ")}], got ${sample.targets.length}`,
      });
    }
  });
});

export type TrainingConfig = z.infer<typeof trainingConfigSchema>;
export type TrainingConfigInput = z.input<typeof trainingConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`);
}

export function parseTrainingConfig(raw: unknown): TrainingConfig {
  const result = trainingConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid training configuration:", formatIssues(result.error));
  }
  return result.data;
}

/** Reads the raw JSON object from a config file, without validating it. */
export function readConfigFile(file: string): unknown {
  let text: string;
  try {
    text = readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function loadTrainingConfig(file: string): TrainingConfig {
  return parseTrainingConfig(readConfigFile(file));
}
