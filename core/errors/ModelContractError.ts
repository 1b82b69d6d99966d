import { QuireError, ErrorSeverity } from './QuireError';

export type ModelContractViolation = 'clone-aliases-original' | 'clone-changes-type';

/**
 * Thrown when a model subclass breaks the contract the erasure adapter relies
 * on, e.g. a `clone()` that hands back the original instance.
 */
export class ModelContractError extends QuireError {
  public readonly violation: ModelContractViolation;
  public readonly modelType: string;

  constructor(modelType: string, violation: ModelContractViolation) {
    const reason = violation === 'clone-aliases-original'
      ? 'clone() returned the original instance'
      : 'clone() returned an instance of a different class';
    super(`Model ${modelType} violates its contract: ${reason}`, {
      code: 'MODEL_CONTRACT',
      severity: ErrorSeverity.Fatal,
      details: { modelType, violation }
    });
    this.violation = violation;
    this.modelType = modelType;
  }
}
