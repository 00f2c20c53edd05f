import { AuditedEngine } from "./auditedEngine.js";
import type { EngineOptions } from "./auditedEngine.js";

export type ChurnPredictor = (customerId: string) => boolean | Promise<boolean>;

export type ChurnPredictionOptions = EngineOptions & {
  /** Defaults to "never at risk". */
  predictor?: ChurnPredictor;
};

export class ChurnPredictionEngine extends AuditedEngine {
  private predictor: ChurnPredictor;

  constructor(opts: ChurnPredictionOptions = {}) {
    super("ChurnPredictionEngine", 20, opts);
    this.predictor = opts.predictor ?? (() => false);
  }

  async predictChurn(customerId: string): Promise<boolean> {
    this.log("predict_churn_called", { customerID: customerId });
    return this.predictor(customerId);
  }

  /** Returns whether an alert went out. */
  async alertIfAtRisk(customerId: string): Promise<boolean> {
    const atRisk = await this.predictChurn(customerId);
    this.log(atRisk ? "alert_sent" : "alert_skipped", { customerID: customerId });
    return atRisk;
  }

  auditLog() {
    this.log("audit_log_recorded");
  }

  statusMessage() {
    return "Churn prediction engine is operational.";
  }
}
