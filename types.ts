export type Logger = Pick<Console, "log" | "error">;

// everything a request needs besides its connection and the cache
export type ServeContext = {
  serverRoot: string;
  serverFiles: string;
  useCache: boolean;
  log: Logger;
  now: () => Date;
};
