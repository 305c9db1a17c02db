import { readFileSync } from "fs";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";
import { describe, expect, it } from "vitest";

import { Cache } from "./cache";
import { fakeSocket, header, parseResponse, quietLogger, SERVER_FILES, SERVER_ROOT, testContext } from "./fake_socket";
import { FALLBACK_404_PAGE, resolvePath, resp404, respFile } from "./static_files";
import { soInit } from "./tcp";

const page404 = readFileSync(path.join(SERVER_FILES, "404.html"));

describe("resolvePath", () => {
  it("joins the request path under the root", () => {
    expect(resolvePath("/srv/www", "/index.html")).toBe(path.resolve("/srv/www/index.html"));
    expect(resolvePath("/srv/www", "/a/./b/../c.html")).toBe(path.resolve("/srv/www/a/c.html"));
  });

  it("rejects paths that climb out of the root", () => {
    expect(resolvePath("/srv/www", "/../etc/passwd")).toBeNull();
    expect(resolvePath("/srv/www", "/a/../../secret")).toBeNull();
    expect(resolvePath("/srv/www", "/")).toBeNull();
  });
});

describe("respFile", () => {
  it("serves a file from the document root with its MIME type", async () => {
    const fake = fakeSocket();

    await respFile(soInit(fake.socket), new Cache(10), "/index.html", testContext());

    const res = parseResponse(fake.written());
    const body = readFileSync(path.join(SERVER_ROOT, "index.html"));
    expect(res.status).toBe("HTTP/1.1 200 OK");
    expect(header(res, "Content-Type")).toBe("text/html");
    expect(header(res, "Content-Length")).toBe(String(body.length));
    expect(res.body).toEqual(body);
  });

  it("answers 404 for a missing file and logs it", async () => {
    const fake = fakeSocket();
    const log = quietLogger();

    await respFile(soInit(fake.socket), new Cache(10), "/missing.html", testContext({ log }));

    const res = parseResponse(fake.written());
    expect(res.status).toBe("HTTP/1.1 404 NOT FOUND");
    expect(res.body).toEqual(page404);
    expect(log.lines).toEqual(["cannot find /missing.html"]);
  });

  it("answers 404 for a path outside the root", async () => {
    const fake = fakeSocket();

    await respFile(soInit(fake.socket), new Cache(10), "/../serverfiles/404.html", testContext());

    expect(parseResponse(fake.written()).status).toBe("HTTP/1.1 404 NOT FOUND");
  });

  it("leaves the cache alone when caching is off", async () => {
    const cache = new Cache(10);

    await respFile(soInit(fakeSocket().socket), cache, "/index.html", testContext());

    expect(cache.size).toBe(0);
  });

  it("serves a cached file after it is gone from disk when caching is on", async () => {
    const root = await mkdtemp(path.join(tmpdir(), "serverroot-"));
    await writeFile(path.join(root, "note.txt"), "cached text");
    const cache = new Cache(10);
    const ctx = testContext({ serverRoot: root, useCache: true });

    await respFile(soInit(fakeSocket().socket), cache, "/note.txt", ctx);
    await rm(path.join(root, "note.txt"));
    const fake = fakeSocket();
    await respFile(soInit(fake.socket), cache, "/note.txt", ctx);

    const res = parseResponse(fake.written());
    expect(res.status).toBe("HTTP/1.1 200 OK");
    expect(header(res, "Content-Type")).toBe("text/plain");
    expect(res.body.toString()).toBe("cached text");
    expect(cache.get("/note.txt")?.contentType).toBe("text/plain");
  });
});

describe("resp404", () => {
  it("sends the system 404 page", async () => {
    const fake = fakeSocket();

    await resp404(soInit(fake.socket), testContext());

    const res = parseResponse(fake.written());
    expect(res.status).toBe("HTTP/1.1 404 NOT FOUND");
    expect(header(res, "Content-Type")).toBe("text/html");
    expect(header(res, "Content-Length")).toBe(String(page404.length));
    expect(res.body).toEqual(page404);
  });

  it("falls back to a built-in page when 404.html is missing", async () => {
    const fake = fakeSocket();
    const log = quietLogger();
    const serverFiles = await mkdtemp(path.join(tmpdir(), "serverfiles-"));

    await resp404(soInit(fake.socket), testContext({ serverFiles, log }));

    const res = parseResponse(fake.written());
    expect(res.status).toBe("HTTP/1.1 404 NOT FOUND");
    expect(res.body).toEqual(FALLBACK_404_PAGE);
    expect(log.lines).toEqual(["cannot find system 404 file"]);
  });
});
