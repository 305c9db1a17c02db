import { bool, cleanEnv, host, num, port, str } from "envalid";

export function loadConfig(env: Record<string, string | undefined> = process.env) {
  return cleanEnv(env, {
    PORT: port({ default: 3490 }),
    HOST: host({ default: "0.0.0.0" }),
    SERVER_ROOT: str({ default: "./serverroot" }),
    SERVER_FILES: str({ default: "./serverfiles" }),
    CACHE_SIZE: num({ default: 10 }),
    // off: files always come from disk, the cache is only constructed
    FILE_CACHE: bool({ default: false }),
  });
}

export type Config = ReturnType<typeof loadConfig>;
