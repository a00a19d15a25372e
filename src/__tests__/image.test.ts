import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  dependencyFingerprint,
  ensureServiceImage,
  listBuildContext,
} from "../image";
import { getService } from "../manifest";
import { testManifest } from "./helpers";

jest.mock("../logger", () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

const DependencyFiles = ["package.json", "package-lock.json"];

function notFound() {
  return Object.assign(new Error("No such image"), { statusCode: 404 });
}

describe("image", () => {
  let dir: string;
  let mockDocker: any;
  let mockImage: { inspect: jest.Mock };

  beforeEach(() => {
    jest.clearAllMocks();
    dir = mkdtempSync(join(tmpdir(), "auctions-image-"));
    writeFileSync(join(dir, "package.json"), '{"name":"auctions"}');
    writeFileSync(join(dir, "Dockerfile"), "FROM node:20-slim\n");
    mkdirSync(join(dir, "src"));
    writeFileSync(join(dir, "src", "index.ts"), "export {};\n");

    mockImage = { inspect: jest.fn() };
    mockDocker = {
      getImage: jest.fn().mockReturnValue(mockImage),
      buildImage: jest.fn().mockResolvedValue("build-stream"),
      pull: jest.fn().mockResolvedValue("pull-stream"),
      modem: {
        followProgress: jest.fn(
          (_stream: unknown, onFinished: (error: Error | null, output: unknown[]) => void) =>
            onFinished(null, [{ stream: "Step 1/6\n" }]),
        ),
      },
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("dependencyFingerprint", () => {
    it("should not change when only source files change", () => {
      const before = dependencyFingerprint(dir, DependencyFiles);
      writeFileSync(join(dir, "src", "index.ts"), "export const x = 1;\n");

      expect(dependencyFingerprint(dir, DependencyFiles)).toBe(before);
    });

    it("should change when a dependency file changes", () => {
      const before = dependencyFingerprint(dir, DependencyFiles);
      writeFileSync(
        join(dir, "package.json"),
        '{"name":"auctions","dependencies":{"pino":"^9.5.0"}}',
      );

      expect(dependencyFingerprint(dir, DependencyFiles)).not.toBe(before);
    });

    it("should change when a lock file appears", () => {
      const before = dependencyFingerprint(dir, DependencyFiles);
      writeFileSync(join(dir, "package-lock.json"), "{}");

      expect(dependencyFingerprint(dir, DependencyFiles)).not.toBe(before);
    });

    it("should not depend on the order the files are listed in", () => {
      expect(dependencyFingerprint(dir, [...DependencyFiles].reverse())).toBe(
        dependencyFingerprint(dir, DependencyFiles),
      );
    });
  });

  describe("listBuildContext", () => {
    it("should leave out dependencies, build output and secrets", () => {
      mkdirSync(join(dir, "node_modules", "pino"), { recursive: true });
      writeFileSync(join(dir, "node_modules", "pino", "index.js"), "");
      writeFileSync(join(dir, ".env"), "POSTGRES_PASSWORD=test-secret\n");

      expect(listBuildContext(dir)).toEqual([
        "Dockerfile",
        "package.json",
        join("src", "index.ts"),
      ]);
    });
  });

  describe("ensureServiceImage", () => {
    it("should reuse an image with the same fingerprint", async () => {
      const manifest = testManifest(dir);
      mockImage.inspect.mockResolvedValue({
        Config: {
          Labels: {
            DependencyFingerprint: dependencyFingerprint(dir, DependencyFiles),
          },
        },
      });

      const built = await ensureServiceImage(
        mockDocker,
        manifest,
        getService(manifest, "auctions"),
      );

      expect(built).toBe(false);
      expect(mockDocker.getImage).toHaveBeenCalledWith("auctions:latest");
      expect(mockDocker.buildImage).not.toHaveBeenCalled();
    });

    it("should build when the image is missing", async () => {
      const manifest = testManifest(dir);
      mockImage.inspect.mockRejectedValue(notFound());

      const built = await ensureServiceImage(
        mockDocker,
        manifest,
        getService(manifest, "auctions"),
      );

      expect(built).toBe(true);
      expect(mockDocker.buildImage).toHaveBeenCalledWith(
        {
          context: dir,
          src: ["Dockerfile", "package.json", join("src", "index.ts")],
        },
        {
          t: "auctions:latest",
          dockerfile: "Dockerfile",
          labels: {
            StackProject: "auctions",
            StackService: "auctions",
            DependencyFingerprint: dependencyFingerprint(dir, DependencyFiles),
          },
        },
      );
      expect(mockDocker.modem.followProgress).toHaveBeenCalledWith(
        "build-stream",
        expect.any(Function),
        expect.any(Function),
      );
    });

    it("should rebuild when dependencies changed", async () => {
      const manifest = testManifest(dir);
      mockImage.inspect.mockResolvedValue({
        Config: { Labels: { DependencyFingerprint: "stale" } },
      });

      const built = await ensureServiceImage(
        mockDocker,
        manifest,
        getService(manifest, "auctions"),
      );

      expect(built).toBe(true);
      expect(mockDocker.buildImage).toHaveBeenCalledTimes(1);
    });

    it("should rebuild a current image when forced", async () => {
      const manifest = testManifest(dir);
      mockImage.inspect.mockResolvedValue({
        Config: {
          Labels: {
            DependencyFingerprint: dependencyFingerprint(dir, DependencyFiles),
          },
        },
      });

      const built = await ensureServiceImage(
        mockDocker,
        manifest,
        getService(manifest, "auctions"),
        { force: true },
      );

      expect(built).toBe(true);
    });

    it("should surface errors reported by the build", async () => {
      const manifest = testManifest(dir);
      mockImage.inspect.mockRejectedValue(notFound());
      mockDocker.modem.followProgress.mockImplementation(
        (_stream: unknown, onFinished: (error: Error | null, output: unknown[]) => void) =>
          onFinished(null, [{ error: "npm ERR! code E404" }]),
      );

      await expect(
        ensureServiceImage(
          mockDocker,
          manifest,
          getService(manifest, "auctions"),
        ),
      ).rejects.toThrow("Image build failed: npm ERR! code E404");
    });

    it("should rethrow daemon errors other than a missing image", async () => {
      const manifest = testManifest(dir);
      const daemonError = Object.assign(new Error("daemon down"), {
        statusCode: 500,
      });
      mockImage.inspect.mockRejectedValue(daemonError);

      await expect(
        ensureServiceImage(
          mockDocker,
          manifest,
          getService(manifest, "auctions"),
        ),
      ).rejects.toBe(daemonError);
      expect(mockDocker.buildImage).not.toHaveBeenCalled();
    });

    it("should pull a missing image for services without a build", async () => {
      const manifest = testManifest(dir);
      mockImage.inspect.mockRejectedValue(notFound());

      const built = await ensureServiceImage(
        mockDocker,
        manifest,
        getService(manifest, "auctions_postgres"),
      );

      expect(built).toBe(false);
      expect(mockDocker.pull).toHaveBeenCalledWith("postgres:16");
      expect(mockDocker.modem.followProgress).toHaveBeenCalledWith(
        "pull-stream",
        expect.any(Function),
      );
    });

    it("should not pull an image that is already present", async () => {
      const manifest = testManifest(dir);
      mockImage.inspect.mockResolvedValue({ Config: { Labels: null } });

      await ensureServiceImage(
        mockDocker,
        manifest,
        getService(manifest, "auctions_redis"),
      );

      expect(mockDocker.getImage).toHaveBeenCalledWith("redis:alpine");
      expect(mockDocker.pull).not.toHaveBeenCalled();
    });
  });
});
