import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { Effect, Either, Layer, pipe } from "effect";
import { Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ScannerServiceTag, ScannerServiceLive } from "./ScannerService";
import { DirectoryServiceLive } from "../DirectoryService";
import { FileStatServiceLive } from "../FileStatService";
import { createTestContext, type TestContext } from "@test/TestContext";

const stubScanner = (ctx: TestContext) =>
  pipe(ScannerServiceLive, Layer.provide(Layer.merge(ctx.layer, Path.layer)));

const scanWith = (ctx: TestContext, root: string) =>
  pipe(
    ScannerServiceTag,
    Effect.flatMap((svc) => svc.scan(root)),
    Effect.provide(stubScanner(ctx)),
    Effect.either,
    Effect.runPromise
  );

describe("ScannerService (unit tests with stubs)", () => {
  test("returns regular files sorted by relative path with base-name entry names", async () => {
    const ctx = createTestContext();
    ctx.addFile("/in/z.txt", 10);
    ctx.addFile("/in/photos/2024/a.jpg", 3000);
    ctx.addFile("/in/b.txt", 20);
    ctx.addDirectory("/in/empty");

    const result = await scanWith(ctx, "/in");

    expect(Either.getOrThrow(result)).toEqual([
      { absolutePath: "/in/b.txt", relativeName: "b.txt", sizeBytes: 20 },
      { absolutePath: "/in/photos/2024/a.jpg", relativeName: "a.jpg", sizeBytes: 3000 },
      { absolutePath: "/in/z.txt", relativeName: "z.txt", sizeBytes: 10 }
    ]);
  });

  test("nested files with the same name keep colliding entry names", async () => {
    const ctx = createTestContext();
    ctx.addFile("/in/a/report.pdf", 1);
    ctx.addFile("/in/b/report.pdf", 2);

    const result = await scanWith(ctx, "/in");

    expect(Either.getOrThrow(result).map((f) => f.relativeName)).toEqual(["report.pdf", "report.pdf"]);
  });

  test("an empty directory yields no files", async () => {
    const ctx = createTestContext();
    ctx.addDirectory("/in");

    const result = await scanWith(ctx, "/in");

    expect(Either.getOrThrow(result)).toEqual([]);
  });

  test("maps a missing root to ScanPathNotFound", async () => {
    const ctx = createTestContext();

    const result = await scanWith(ctx, "/missing");

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ScanPathNotFound");
      expect(result.left.path).toBe("/missing");
    }
  });

  test("maps an unreadable file to ScanPermissionDenied with its path", async () => {
    const ctx = createTestContext();
    ctx.addFile("/in/ok.txt", 1);
    ctx.addFile("/in/secret.txt", 1, { permissionDenied: true });

    const result = await scanWith(ctx, "/in");

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ScanPermissionDenied");
      expect(result.left.path).toBe("/in/secret.txt");
    }
  });
});

const RealScannerService = pipe(
  ScannerServiceLive,
  Layer.provide(Layer.merge(DirectoryServiceLive, FileStatServiceLive)),
  Layer.provide(NodeContext.layer)
);

describe("ScannerService (integration tests)", () => {
  let root = "";

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), "scanner-test-"));
    await mkdir(join(root, "sub", "deeper"), { recursive: true });
    await writeFile(join(root, "top.bin"), new Uint8Array(5));
    await writeFile(join(root, "sub", "mid.bin"), new Uint8Array(7));
    await writeFile(join(root, "sub", "deeper", "low.bin"), new Uint8Array(11));
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("scan works on a real directory tree", async () => {
    const result = await pipe(
      ScannerServiceTag,
      Effect.flatMap((svc) => svc.scan(root)),
      Effect.provide(RealScannerService),
      Effect.runPromise
    );

    expect(result).toEqual([
      { absolutePath: join(root, "sub", "deeper", "low.bin"), relativeName: "low.bin", sizeBytes: 11 },
      { absolutePath: join(root, "sub", "mid.bin"), relativeName: "mid.bin", sizeBytes: 7 },
      { absolutePath: join(root, "top.bin"), relativeName: "top.bin", sizeBytes: 5 }
    ]);
  });
});
