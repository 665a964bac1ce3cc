/**
 * Error taxonomy for language detection
 */

export type LangForestErrorCode = 'EMPTY_INPUT' | 'MALFORMED_MODEL' | 'UNKNOWN_LABEL';

export class LangForestError extends Error {
  readonly code: LangForestErrorCode;

  constructor(code: LangForestErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Input produced no tokens, so there is no frequency vector to classify. */
export class EmptyInputError extends LangForestError {
  constructor() {
    super('EMPTY_INPUT', 'Input contains no tokens to classify');
  }
}

export interface ModelIssue {
  /** JSON path into the asset, e.g. `forest[3].right.left` */
  path: string;
  message: string;
}

export class MalformedModelError extends LangForestError {
  readonly issues: readonly ModelIssue[];

  constructor(issues: ModelIssue[], source?: string) {
    const where = source ? ` (${source})` : '';
    const first = issues[0];
    const detail = first ? `: ${first.path || '<root>'}: ${first.message}` : '';
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super('MALFORMED_MODEL', `Malformed model${where}${detail}${more}`);
    this.issues = issues;
  }
}

export class UnknownLabelError extends LangForestError {
  readonly label: number;

  constructor(label: number) {
    super('UNKNOWN_LABEL', `Label id ${label} is not in the label table`);
    this.label = label;
  }
}
