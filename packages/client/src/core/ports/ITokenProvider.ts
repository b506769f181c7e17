/**
 * Token Provider Port
 * Supplies connection and subscription tokens on demand.
 *
 * Throw `UnauthorizedError` to stop the client from retrying; any other
 * error is reported and retried with backoff.
 */
export interface ITokenProvider {
  getConnectionToken(): Promise<string>;
  getSubscriptionToken?(channel: string): Promise<string>;
}
