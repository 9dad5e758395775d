export type WaitForOptions = {
  timeout?: number;
  interval?: number;
  errorMessage?: string;
};

/**
 * HTTP status answered per request path; unlisted paths answer 404
 */
export type StubRoutes = Record<string, number>;

export type StubServerOptions = {
  port: number;
  host?: string;
  routes?: StubRoutes;
  /** Delay every response, to exercise probe timeouts */
  responseDelayMs?: number;
};

export type StubAutomationServer = {
  readonly port: number;
  readonly url: string;
  /** Paths requested so far, in order */
  readonly requests: string[];
  readonly listening: boolean;
  setRoute(path: string, status: number): void;
  start(): Promise<void>;
  stop(): Promise<void>;
};
