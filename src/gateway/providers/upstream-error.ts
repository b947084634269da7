import type { ProviderName } from "../provider-router.js";

/** Non-2xx answer from an upstream provider. */
export class UpstreamError extends Error {
  constructor(
    public readonly provider: ProviderName,
    public readonly httpStatus: number,
    body: string,
  ) {
    super(`${provider} API error (${httpStatus}): ${body.slice(0, 200)}`);
    this.name = "UpstreamError";
  }
}
