/**
 * Error thrown when a configuration document cannot be parsed or validated.
 */
export class FilesystemConfigError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = [],
    public readonly source?: string
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'FilesystemConfigError';
    Object.setPrototypeOf(this, FilesystemConfigError.prototype);
  }
}
