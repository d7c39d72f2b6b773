export class MetadataFormatError extends Error {
  public readonly name = "MetadataFormatError";

  constructor(
    public readonly source: string,
    public readonly issues: string[]
  ) {
    super(`Invalid ${source}: ${issues.join("; ")}`);
  }
}
