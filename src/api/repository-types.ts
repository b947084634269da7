export interface RateLimitEntry {
  key: string;
  scope: string;
  count: number;
  windowStart: number;
}
