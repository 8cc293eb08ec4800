/**
 * Serializer Module
 * Writes an in-memory network as RoutingKit text vectors
 */

import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import type { RoutingKitNetwork } from "../types";

// Same order as the default attribute list
const NETWORK_FILES: ReadonlyArray<[keyof RoutingKitNetwork, string]> = [
  ["head", "head"],
  ["travelTime", "travel_time"],
  ["firstOut", "first_out"],
  ["latitude", "latitude"],
  ["longitude", "longitude"],
];

/**
 * Write one value per line
 */
export async function writeTextVector(
  values: readonly number[],
  file: string,
): Promise<void> {
  const content = values.map((value) => `${value}\n`).join("");
  await writeFile(file, content, "utf-8");
}

/**
 * Writes the five attribute files into `directory`, creating it if needed
 *
 * @returns Paths of the written files, in attribute order
 */
export async function serializeNetwork(
  network: RoutingKitNetwork,
  directory: string,
): Promise<string[]> {
  await mkdir(directory, { recursive: true });

  const written: string[] = [];
  for (const [key, name] of NETWORK_FILES) {
    const file = path.join(directory, name);
    await writeTextVector(network[key], file);
    written.push(file);
  }

  return written;
}
