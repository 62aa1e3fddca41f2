// Upstream payload did not match the expected trade page shape.
export class UpstreamParseError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(message);
    this.name = 'UpstreamParseError';
  }
}
