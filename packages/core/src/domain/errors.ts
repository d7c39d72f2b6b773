import type { Diagnostic } from "./diagnostics";

export class RuleTokenParseError extends Error {
  public readonly name = "RuleTokenParseError";

  constructor(
    public readonly token: string,
    public readonly reason: string
  ) {
    super(`Cannot parse requirement "${token}": ${reason}`);
  }
}

export class RulePayloadError extends Error {
  public readonly name = "RulePayloadError";

  constructor(
    public readonly targetCode: string,
    public readonly issues: string[]
  ) {
    super(`Malformed rule payload for "${targetCode}": ${issues.join("; ")}`);
  }
}

export class GraphBuildError extends Error {
  public readonly name = "GraphBuildError";

  constructor(
    public readonly moduleId: string,
    public readonly diagnostics: Diagnostic[]
  ) {
    const last = diagnostics[diagnostics.length - 1];
    super(
      `Strict build of module "${moduleId}" aborted${last ? `: ${last.message}` : ""}`
    );
  }
}

export class UnsupportedModuleError extends Error {
  public readonly name = "UnsupportedModuleError";

  constructor(
    public readonly moduleId: string,
    public readonly supported: readonly string[]
  ) {
    super(
      `Module "${moduleId}" is not covered by every metadata source (supported: ${
        supported.length ? supported.join(", ") : "none"
      }).`
    );
  }
}
