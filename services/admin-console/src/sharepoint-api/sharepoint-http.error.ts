export function describeHttpStatus(statusCode: number): string {
  switch (statusCode) {
    case 401:
      return 'Authentication failed - cookies may have expired';
    case 403:
      return 'Access denied - insufficient permissions';
    case 404:
      return 'Site or resource not found';
    default:
      return `HTTP error: ${statusCode}`;
  }
}

export class SharepointHttpError extends Error {
  public constructor(
    public readonly statusCode: number,
    public readonly responseSnippet?: string,
  ) {
    super(describeHttpStatus(statusCode));
    this.name = 'SharepointHttpError';
  }

  public get isAuthenticationFailure(): boolean {
    return this.statusCode === 401;
  }
}
