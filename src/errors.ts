/**
 * Raised for settings a session cannot run with: non-positive limits,
 * thresholds out of range, or a system prompt larger than the budget.
 */
export class ContextConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid context configuration: ${issues.join('; ')}`);
    this.name = 'ContextConfigError';
    this.issues = issues;
  }
}
