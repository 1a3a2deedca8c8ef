import { z } from "zod";
import { parseTrainingConfig, readConfigFile, type TrainingConfig } from "../../config";
import { assert, ConfigError } from "../../errors";
import type { Logger } from "../../log";
import { NeuralNet } from "../../NeuralNet";
import { createRandom } from "../../Random";
import { train, type TrainingHistory } from "../../Trainer";

export const trainArgsSchema = z.object({
  config: z.string().min(1, "--config needs a file path").optional(),
  iterations: z.number().optional(),
  learningRate: z.number().optional(),
  seed: z.number().optional(),
  layers: z.array(z.number()).optional(),
  hiddenActivation: z.enum(["linear", "relu"]).optional(),
  logEvery: z.number().optional(),
  predict: z.array(z.string()).default([]),
  verbose: z.boolean().default(false),
});

export type TrainArgs = z.infer<typeof trainArgsSchema>;

export interface Prediction {
  inputs: number[];
  outputs: number[];
}

export interface TrainRunResult {
  config: TrainingConfig;
  net: NeuralNet;
  history: TrainingHistory;
  predictions: Prediction[];
}

const configObjectSchema = z.record(z.string(), z.unknown());

/**
 * Config file first, then every flag that was given on the command line.
 */
export function resolveTrainingConfig(args: TrainArgs): TrainingConfig {
  let base: Record<string, unknown> = {};
  if (args.config !== undefined) {
    const parsed = configObjectSchema.safeParse(readConfigFile(args.config));
    if (!parsed.success) {
      throw new ConfigError(`Config file ${args.config} must contain a JSON object`);
    }
    base = parsed.data;
  }

  const overrides: Record<string, unknown> = {};
  if (args.iterations !== undefined) overrides.iterations = args.iterations;
  if (args.learningRate !== undefined) overrides.learningRate = args.learningRate;
  if (args.seed !== undefined) overrides.seed = args.seed;
  if (args.layers !== undefined) overrides.layers = args.layers;
  if (args.hiddenActivation !== undefined) overrides.hiddenActivation = args.hiddenActivation;
  if (args.logEvery !== undefined) overrides.logEvery = args.logEvery;

  return parseTrainingConfig({ ...base, ...overrides });
}

/** Parses `"9,4"` into `[9, 4]`. */
export function parsePredictionInput(raw: string): number[] {
  const parts = raw.split(",").map(p => p.trim());
  const values = parts.map(Number);
  assert(
    parts.every(p => p.length > 0) && values.every(Number.isFinite),
    `--predict expects comma-separated numbers, got "${raw}"`,
    2
  );
  return values;
}

export function runTrain(args: TrainArgs, log: Logger): TrainRunResult {
  const config = resolveTrainingConfig(args);
  const inputs = args.predict.map(parsePredictionInput);
  for (const row of inputs) {
    assert(
      row.length === config.layers[0],
      `--predict needs ${config.layers[0]} values per input, got ${row.length}`,
      2
    );
  }

  const random = config.seed !== undefined ? createRandom(config.seed) : Math.random;
  const net = new NeuralNet(config.layers, { random, hiddenActivation: config.hiddenActivation });
  log.debug(`network [${config.layers.join(", ")}], ${net.parameters().length} parameters`);

  const history = train(net, config.dataset, {
    iterations: config.iterations,
    learningRate: config.learningRate,
    logEvery: config.logEvery,
    logger: log,
  });
  log.info(`final loss=${history.finalLoss}`);
  net.dump(line => log.info(line));

  const predictions = inputs.map(row => ({ inputs: row, outputs: net.predict(row) }));
  for (const p of predictions) {
    log.info(`predict [${p.inputs.join(", ")}] = ${p.outputs.join(", ")}`);
  }
  return { config, net, history, predictions };
}
