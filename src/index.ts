export { Value, type BackwardFn, type Operation } from './Value';
export { V } from './V';
export { Losses } from './Losses';
export { Optimizer, SGD, type OptimizerOptions } from './Optimizers';
export {
  Layer,
  NeuralNet,
  Neuron,
  type Activation,
  type NeuralNetOptions,
  type NeuronOptions,
  type NeuronParameters,
} from './NeuralNet';
export { createRandom, uniform, type RandomSource } from './Random';
export { datasetLoss, meanLoss, train, type TrainOptions, type TrainingHistory } from './Trainer';
export {
  DEFAULT_DATASET,
  loadTrainingConfig,
  parseTrainingConfig,
  trainingConfigSchema,
  type Sample,
  type TrainingConfig,
  type TrainingConfigInput,
} from './config';
export { CliError, ConfigError } from './errors';
export { createLogger, logger, type LogSink, type Logger, type LoggerOptions } from './log';
