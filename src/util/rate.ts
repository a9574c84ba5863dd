import Bottleneck from 'bottleneck';

export type LimiterOptions = {
  minTime?: number;
  maxConcurrent?: number;
};

/** Shared across all vendors: caps how many lookups run at once. */
export const createLimiter = ({ minTime = 250, maxConcurrent = 3 }: LimiterOptions = {}): Bottleneck =>
  new Bottleneck({ minTime, maxConcurrent });

// Vendor storefronts are small shops; one request at a time each.
export const createVendorLimiter = (): Bottleneck => createLimiter({ minTime: 500, maxConcurrent: 1 });
