import { fingerprint } from "../../lib/hash";
import type { ForecastConfig } from "../config";
import { ForecastError, errorMessage } from "../errors";
import type { Direction, FeatureSet, ForecastArtifact, ModelSnapshot } from "../types";

import { LinearAutoregressiveModel, type SequenceModel } from "./model";

const DAY_MS = 24 * 60 * 60 * 1000;

export type ForecastResult = {
  forecast: ForecastArtifact;
  model: ModelSnapshot;
  /**
  * `false` when a persisted model was reused.
  */
  trained: boolean;
};

/**
* `flat` when the predicted move is strictly inside the deadband.
*/
export function classifyDirection(predictedClose: number, lastClose: number, deadband: number): Direction {
  const delta = predictedClose - lastClose;
  if (Math.abs(delta) < deadband) {
    return "flat";
  }
  return delta > 0 ? "up" : "down";
}

export class Forecaster {
  readonly #cfg: ForecastConfig;
  readonly #model: SequenceModel;
  readonly #now: () => Date;

  constructor(cfg: ForecastConfig, opts: { model?: SequenceModel; now?: () => Date } = {}) {
    this.#cfg = cfg;
    this.#model = opts.model ?? new LinearAutoregressiveModel();
    this.#now = opts.now ?? (() => new Date());
  }

  get modelId(): string {
    return this.#model.id;
  }

  trainingFingerprint(): string {
    const { lookback, epochs, learningRate, tolerance } = this.#cfg;
    return fingerprint({ model: this.#model.id, lookback, epochs, learningRate, tolerance });
  }

  /**
  * A persisted snapshot is reused when it came from the same model and training
  * settings, was trained on data no newer than `asOf`, and is younger than
  * `retrainAfterDays`.
  */
  canReuse(snapshot: ModelSnapshot | null, asOf: string): snapshot is ModelSnapshot {
    if (!snapshot) {
      return false;
    }
    if (
      snapshot.algorithm !== this.#model.id ||
      snapshot.lookback !== this.#cfg.lookback ||
      snapshot.configFingerprint !== this.trainingFingerprint()
    ) {
      return false;
    }

    const ageMs = Date.parse(asOf) - Date.parse(snapshot.trainedAsOf);
    return Number.isFinite(ageMs) && ageMs >= 0 && ageMs < this.#cfg.retrainAfterDays * DAY_MS;
  }

  /**
  * Produces the next-period forecast for the last row of `features`.
  *
  * The predicted close and the direction label come from the same snapshot in
  * this one call.
  */
  predict(features: FeatureSet, previousModel: ModelSnapshot | null = null): ForecastResult {
    const { symbol } = features;
    const closes = features.rows.map((r) => r.close);
    const lastClose = closes[closes.length - 1];
    if (lastClose === undefined) {
      throw new ForecastError(symbol, "feature set has no rows");
    }

    const needed = this.#cfg.lookback + this.#cfg.minTrainingSamples;
    if (closes.length < needed) {
      throw new ForecastError(symbol, `need >= ${needed} feature rows to train, have ${closes.length}`);
    }

    const now = this.#now();
    let snapshot: ModelSnapshot;
    let trained = false;
    try {
      if (this.canReuse(previousModel, features.asOf)) {
        snapshot = previousModel;
      } else {
        snapshot = this.#model.train(closes, {
          lookback: this.#cfg.lookback,
          epochs: this.#cfg.epochs,
          learningRate: this.#cfg.learningRate,
          tolerance: this.#cfg.tolerance,
          trainedAsOf: features.asOf,
          trainedAt: now.toISOString(),
          configFingerprint: this.trainingFingerprint()
        });
        trained = true;
      }
    } catch (error) {
      throw new ForecastError(symbol, errorMessage(error), error);
    }

    let predictedClose: number;
    try {
      predictedClose = this.#model.predict(snapshot, closes.slice(-snapshot.lookback));
    } catch (error) {
      throw new ForecastError(symbol, errorMessage(error), error);
    }
    if (!Number.isFinite(predictedClose)) {
      throw new ForecastError(symbol, `model produced a non-finite prediction (${predictedClose})`);
    }

    return {
      forecast: {
        symbol,
        asOf: features.asOf,
        predictedClose,
        lastClose,
        changePct: ((predictedClose - lastClose) / lastClose) * 100,
        direction: classifyDirection(predictedClose, lastClose, this.#cfg.deadband),
        deadband: this.#cfg.deadband,
        modelVersion: snapshot.version,
        generatedAt: now.toISOString()
      },
      model: snapshot,
      trained
    };
  }
}
