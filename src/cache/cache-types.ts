export interface CacheEntry<T> {
  value: T;
  expiresAt: number; // Absolute expiry, epoch ms
  createdAt: number;
  hits: number;
}

export interface CacheOptions {
  maxSize?: number;     // Maximum number of entries in cache
  defaultTtlMs?: number; // Time-to-live applied when set() gets none
}

export interface CacheEntryInfo {
  createdAt: number;
  expiresAt: number;
  hits: number;
}

export interface CacheStats {
  size: number;
  capacity: number;
  utilization: number; // Percent of capacity in use, one decimal
  hits: number;
  misses: number;
  totalRequests: number;
  hitRate: number; // Percent of reads served from cache, one decimal
}

export type ComputeFn<T> = () => Promise<T>;
