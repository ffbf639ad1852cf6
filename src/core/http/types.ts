// src/core/http/types.ts

export interface HttpRequestConfig {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  /** HTTP Basic credentials */
  auth?: { username: string; password: string };
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface HttpCoreOptions {
  timeout?: number; // milliseconds
  userAgent?: string;
}
