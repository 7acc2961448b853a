export type ConfigIssueV1 = {
  path: string; // dotted path into the document, "$" for the root
  message: string;
};

/** Raised when an advisory configuration document fails admission. Carries every issue found. */
export class ConfigRejectedError extends Error {
  readonly errors: readonly ConfigIssueV1[];

  constructor(errors: readonly ConfigIssueV1[]) {
    const first = errors[0];
    const head = first ? `${first.path}: ${first.message}` : "no detail";
    const more = errors.length > 1 ? ` (+${errors.length - 1} more)` : "";
    super(`CONFIG_REJECTED: ${head}${more}`);
    this.name = "ConfigRejectedError";
    this.errors = Object.freeze([...errors]);
  }
}
