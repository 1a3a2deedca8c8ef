import yargs from "yargs";
import { CliError, ConfigError } from "../errors";
import { createLogger, type LogSink } from "../log";
import { runTrain, trainArgsSchema, type TrainRunResult } from "./commands/train";

export interface CliIO {
  /** Progress, dump and prediction lines. */
  out: LogSink;
  /** `error: …` lines. */
  err: LogSink;
}

export interface CliOutcome {
  exitCode: number;
  /** Set when the train command ran to completion. */
  result?: TrainRunResult;
}

/** 2 for configuration problems, the CliError's own code, 1 for anything else. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CliError) return err.exitCode;
  if (err instanceof ConfigError) return 2;
  return 1;
}

/**
 * Parses `args` (already stripped of the node and script paths), runs the
 * command and reports failures as a single `error:` line plus an exit code.
 * Never exits the process.
 */
export async function runCli(args: string[], io: CliIO): Promise<CliOutcome> {
  let result: TrainRunResult | undefined;

  const cli = yargs(args)
    .scriptName("scalar-backprop")
    .usage("$0 [train] [options]")
    .strict()
    .exitProcess(false)
    .fail(false)
    .command(
      ["train", "$0"],
      "Train a network on a dataset and print its parameters.",
      cmd => cmd
        .option("config", { type: "string", describe: "JSON training configuration file." })
        .option("iterations", { type: "number", describe: "Training iterations (default 1000)." })
        .option("learning-rate", { type: "number", describe: "SGD step size (default 1e-4)." })
        .option("seed", { type: "number", describe: "Seed for weight initialization." })
        .option("layers", { type: "number", array: true, describe: "Layer sizes, input first (default 2 1)." })
        .option("hidden-activation", { type: "string", choices: ["linear", "relu"], describe: "Activation of hidden layers." })
        .option("log-every", { type: "number", describe: "Print the loss every N iterations, 0 for never." })
        .option("predict", { type: "string", array: true, describe: "Comma-separated inputs to run through the trained network." })
        .option("verbose", { type: "boolean", default: false, describe: "Print debug output." }),
      async argv => {
        const options = trainArgsSchema.parse(argv);
        result = runTrain(options, createLogger({ verbose: options.verbose || undefined, sink: io.out }));
      }
    );

  try {
    await cli.parseAsync();
  } catch (err) {
    io.err(`error: ${err instanceof Error ? err.message : String(err)}`);
    return { exitCode: exitCodeFor(err) };
  }
  return { exitCode: 0, result };
}
