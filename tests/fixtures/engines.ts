import type { Classification, ClassificationEngine, EngineResult } from "@/classify/types.js";

/**
 * Engine that answers every request with a fixed verdict and records its inputs
 */
export class FixedEngine implements ClassificationEngine {
  readonly calls: Array<{ instructions: string; rawRequest: string }> = [];

  constructor(
    readonly name: string,
    private readonly classification: Classification,
    private readonly confidence: number,
    private readonly attackType = "none",
    private readonly degraded = false
  ) {}

  async classify(instructions: string, rawRequest: string): Promise<EngineResult> {
    this.calls.push({ instructions, rawRequest });
    return {
      classification: this.classification,
      confidence: this.confidence,
      attackType: this.attackType,
      reason: `${this.name} says ${this.classification}`,
      classifier: this.name,
      responseTimeMs: 1,
      degraded: this.degraded,
    };
  }
}
