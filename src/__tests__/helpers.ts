import { Server } from "node:http";
import { AuctionsConfig, loadConfig } from "../config";
import { StackManifest } from "../lib/types/manifest";
import { createStackManifest } from "../manifest";

export const ProjectDir = "/project";

export function testConfig(env: Record<string, string> = {}): AuctionsConfig {
  return loadConfig({ AUCTIONS_ENV_FILE: "/nonexistent/.env", ...env });
}

/**
 * The auctions stack as declared from default configuration
 */
export function testManifest(projectDir = ProjectDir): StackManifest {
  return createStackManifest(testConfig(), projectDir);
}

export function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return address.port;
}
