import { describe, expect, it } from "vitest";

import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("fills in defaults", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3490);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.SERVER_ROOT).toBe("./serverroot");
    expect(config.SERVER_FILES).toBe("./serverfiles");
    expect(config.CACHE_SIZE).toBe(10);
    expect(config.FILE_CACHE).toBe(false);
  });

  it("reads values from the environment", () => {
    const config = loadConfig({ PORT: "8080", HOST: "127.0.0.1", CACHE_SIZE: "3", FILE_CACHE: "true" });

    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.CACHE_SIZE).toBe(3);
    expect(config.FILE_CACHE).toBe(true);
  });
});
