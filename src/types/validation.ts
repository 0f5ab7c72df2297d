export type ValidationIssue = {
  /** `<location>.<parameter>`, e.g. `query.limit` or `body.owner.name`. */
  path: string;
  message: string;
  code: string;
};

export type ValidationDetails = ValidationIssue[];
