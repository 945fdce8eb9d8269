export class DataUnavailableError extends Error {
  constructor(message: string, public table: string, public missingColumns: string[] = []) {
    super(message);
    this.name = 'DataUnavailableError';
  }
}

export class UnknownEntityError extends Error {
  constructor(public entityId: string) {
    super(`No claims found for entity ${entityId}`);
    this.name = 'UnknownEntityError';
  }
}

export class UnknownDetectionRuleError extends Error {
  constructor(public ruleId: string) {
    super(`Unknown detection rule: ${ruleId}`);
    this.name = 'UnknownDetectionRuleError';
  }
}

export class ScanConfigError extends Error {
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = 'ScanConfigError';
  }
}
