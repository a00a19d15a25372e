import {
  launchServiceContainer,
  removeServiceContainers,
  waitForHealthy,
} from "../containers";
import { ReadinessTimeoutError } from "../errors";
import { ensureServiceImage } from "../image";
import { ensureNetworks, removeStackNetworks } from "../networks";
import { Stack } from "../orchestrator";
import { ensureVolumes, removeStackVolumes } from "../volumes";
import { testManifest } from "./helpers";

jest.mock("../logger", () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));
jest.mock("../containers");
jest.mock("../image");
jest.mock("../networks");
jest.mock("../volumes");

const readiness = { attempts: 3, intervalMs: 0 };

function fakeContainer(id: string): any {
  return { id };
}

describe("Stack", () => {
  const mockDocker: any = {};
  const networks: any = { "auctions-private-network": { id: "private-id" } };
  let calls: string[];

  beforeEach(() => {
    jest.clearAllMocks();
    calls = [];
    jest.mocked(ensureNetworks).mockImplementation(async () => {
      calls.push("networks");
      return networks;
    });
    jest.mocked(ensureVolumes).mockImplementation(async () => {
      calls.push("volumes");
      return [];
    });
    jest.mocked(ensureServiceImage).mockImplementation(
      async (_docker, _manifest, service) => {
        calls.push(`image:${service.name}`);
        return false;
      },
    );
    jest.mocked(launchServiceContainer).mockImplementation(
      async (_docker, _manifest, service) => {
        calls.push(`launch:${service.name}`);
        return fakeContainer(service.name);
      },
    );
    jest.mocked(waitForHealthy).mockImplementation(
      async (_container, service) => {
        calls.push(`healthy:${service.name}`);
        return 1;
      },
    );
    jest.mocked(removeServiceContainers).mockImplementation(async () => {
      calls.push("remove:containers");
      return ["auctions_app"];
    });
    jest.mocked(removeStackNetworks).mockImplementation(async () => {
      calls.push("remove:networks");
      return ["auctions_auctions-private-network"];
    });
    jest.mocked(removeStackVolumes).mockImplementation(async () => {
      calls.push("remove:volumes");
      return ["auctions_postgres_auctions_data"];
    });
  });

  describe("up", () => {
    it("should start dependencies and wait for them before the application", async () => {
      const stack = new Stack(mockDocker, testManifest(), readiness);

      const result = await stack.up();

      expect(result.started).toEqual([
        "auctions_postgres",
        "auctions_redis",
        "auctions",
      ]);
      expect(Object.keys(result.containers)).toEqual(result.started);
      expect(result.networks).toBe(networks);
      expect(calls).toEqual([
        "networks",
        "volumes",
        "image:auctions_postgres",
        "launch:auctions_postgres",
        "image:auctions_redis",
        "launch:auctions_redis",
        "image:auctions",
        "healthy:auctions_postgres",
        "healthy:auctions_redis",
        "launch:auctions",
      ]);
      expect(waitForHealthy).toHaveBeenCalledWith(
        { id: "auctions_postgres" },
        expect.objectContaining({ name: "auctions_postgres" }),
        readiness,
      );
    });

    it("should only start the selected services and their dependencies", async () => {
      const stack = new Stack(mockDocker, testManifest(), readiness);

      const result = await stack.up({ services: ["auctions_postgres"] });

      expect(result.started).toEqual(["auctions_postgres"]);
      expect(calls).not.toContain("launch:auctions");
    });

    it("should wait for every launched service when asked", async () => {
      const stack = new Stack(mockDocker, testManifest(), readiness);

      await stack.up({
        services: ["auctions_postgres", "auctions_redis"],
        wait: true,
      });

      expect(calls.slice(-2)).toEqual([
        "healthy:auctions_postgres",
        "healthy:auctions_redis",
      ]);
    });

    it("should force image builds with the build option", async () => {
      const manifest = testManifest();
      const stack = new Stack(mockDocker, manifest, readiness);

      await stack.up({ build: true });

      expect(ensureServiceImage).toHaveBeenCalledWith(
        mockDocker,
        manifest,
        expect.objectContaining({ name: "auctions" }),
        { force: true },
      );
    });

    it("should not start the application when a dependency stays unhealthy", async () => {
      const failure = new ReadinessTimeoutError("auctions_postgres", 3);
      jest.mocked(waitForHealthy).mockRejectedValue(failure);
      const stack = new Stack(mockDocker, testManifest(), readiness);

      await expect(stack.up()).rejects.toBe(failure);
      expect(calls).not.toContain("launch:auctions");
    });
  });

  describe("down", () => {
    it("should remove containers and networks but keep volumes", async () => {
      const stack = new Stack(mockDocker, testManifest(), readiness);

      const result = await stack.down();

      expect(result).toEqual({
        containers: ["auctions_app"],
        networks: ["auctions_auctions-private-network"],
        volumes: [],
      });
      expect(calls).toEqual(["remove:containers", "remove:networks"]);
    });

    it("should remove volumes when asked", async () => {
      const stack = new Stack(mockDocker, testManifest(), readiness);

      const result = await stack.down({ volumes: true });

      expect(result.volumes).toEqual(["auctions_postgres_auctions_data"]);
      expect(calls).toEqual([
        "remove:containers",
        "remove:networks",
        "remove:volumes",
      ]);
    });
  });

  it("should not overlap up and down", async () => {
    const stack = new Stack(mockDocker, testManifest(), readiness);

    await Promise.all([stack.up(), stack.down()]);

    expect(calls.indexOf("remove:containers")).toBe(
      calls.indexOf("launch:auctions") + 1,
    );
  });
});
