import type { ModelSnapshot } from "../types";

export type TrainOptions = {
  lookback: number;
  epochs: number;
  learningRate: number;
  tolerance: number;
  trainedAsOf: string;
  trainedAt: string;
  configFingerprint: string;
};

/**
* Opaque sequence-model capability. The forecaster only trains, persists and
* replays snapshots; it never looks inside `weights`.
*/
export interface SequenceModel {
  readonly id: string;
  train(series: readonly number[], options: TrainOptions): ModelSnapshot;
  predict(snapshot: ModelSnapshot, window: readonly number[]): number;
}

export class ModelTrainingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelTrainingError";
  }
}

function scaleOf(series: readonly number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const v of series) {
    min = Math.min(min, v);
    max = Math.max(max, v);
  }
  return { min, max };
}

function toUnit(v: number, scale: { min: number; max: number }): number {
  const span = scale.max - scale.min;
  return span === 0 ? 0 : (v - scale.min) / span;
}

function fromUnit(v: number, scale: { min: number; max: number }): number {
  return v * (scale.max - scale.min) + scale.min;
}

function dot(weights: readonly number[], xs: readonly number[], offset: number, bias: number): number {
  let sum = bias;
  for (let j = 0; j < weights.length; j += 1) {
    sum += (weights[j] ?? 0) * (xs[offset + j] ?? 0);
  }
  return sum;
}

/**
* Linear autoregressive regressor over a min-max scaled look-back window.
*
* Training is full-batch gradient descent on mean squared error, starting from
* the persistence forecast (next = last), with the step size divided by the
* number of inputs so `learningRate` stays in (0, 1) whatever the look-back.
* Deterministic for a given series and options.
*/
export class LinearAutoregressiveModel implements SequenceModel {
  readonly id = "linear-ar-v1";

  train(series: readonly number[], options: TrainOptions): ModelSnapshot {
    const { lookback } = options;
    const samples = series.length - lookback;
    if (lookback <= 0 || samples <= 0) {
      throw new ModelTrainingError(`need more than ${lookback} values to train, got ${series.length}`);
    }
    if (!series.every((v) => Number.isFinite(v))) {
      throw new ModelTrainingError("training series contains non-finite values");
    }

    const scale = scaleOf(series);
    const xs = series.map((v) => toUnit(v, scale));
    const weights: number[] = new Array(lookback).fill(0);
    weights[lookback - 1] = 1;
    let bias = 0;

    const step = options.learningRate / (lookback + 1);
    const grad: number[] = new Array(lookback).fill(0);

    const lossAt = (): number => {
      let sum = 0;
      for (let i = 0; i < samples; i += 1) {
        const err = dot(weights, xs, i, bias) - (xs[i + lookback] ?? 0);
        sum += err * err;
      }
      return sum / samples;
    };

    const initialLoss = lossAt();
    let loss = initialLoss;
    let epochs = 0;

    for (let epoch = 0; epoch < options.epochs; epoch += 1) {
      grad.fill(0);
      let gradBias = 0;

      for (let i = 0; i < samples; i += 1) {
        const err = dot(weights, xs, i, bias) - (xs[i + lookback] ?? 0);
        for (let j = 0; j < lookback; j += 1) {
          grad[j] = (grad[j] ?? 0) + err * (xs[i + j] ?? 0);
        }
        gradBias += err;
      }

      for (let j = 0; j < lookback; j += 1) {
        weights[j] = (weights[j] ?? 0) - (step * 2 * (grad[j] ?? 0)) / samples;
      }
      bias -= (step * 2 * gradBias) / samples;

      const next = lossAt();
      epochs = epoch + 1;
      if (!Number.isFinite(next)) {
        throw new ModelTrainingError(`loss diverged at epoch ${epochs}`);
      }

      const improvement = loss - next;
      loss = next;
      if (Math.abs(improvement) < options.tolerance) {
        break;
      }
    }

    if (!Number.isFinite(loss) || loss > initialLoss) {
      throw new ModelTrainingError(`training did not converge (loss ${loss} vs initial ${initialLoss})`);
    }

    return {
      algorithm: this.id,
      version: `${this.id}@${options.trainedAsOf}`,
      lookback,
      weights,
      bias,
      scale,
      trainedAsOf: options.trainedAsOf,
      trainedAt: options.trainedAt,
      samples,
      epochs,
      finalLoss: loss,
      configFingerprint: options.configFingerprint
    };
  }

  predict(snapshot: ModelSnapshot, window: readonly number[]): number {
    if (snapshot.algorithm !== this.id) {
      throw new ModelTrainingError(`snapshot algorithm ${snapshot.algorithm} is not ${this.id}`);
    }
    if (window.length !== snapshot.lookback) {
      throw new ModelTrainingError(`window has ${window.length} values, model expects ${snapshot.lookback}`);
    }

    const xs = window.map((v) => toUnit(v, snapshot.scale));
    return fromUnit(dot(snapshot.weights, xs, 0, snapshot.bias), snapshot.scale);
  }
}
