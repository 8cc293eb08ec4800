/**
 * External-interface constants and path resolution
 *
 * The directory names, the `_bin` suffix and the trailing slash on the
 * binary directory are conventions of InertialFlowCutter's ordering script
 * and console tool. Do not change them without checking the tool.
 */

import path from "node:path";
import type { DataLayout, ToolchainPaths } from "../types";

export const CONVERTER_PATH = "build/console";
export const ORDERING_SCRIPT = "inertialflowcutter_order.py";

export const BINARY_DIRECTORY = "binary";
export const ORDERING_DIRECTORY = "ordering";
export const BINARY_ORDER_SUFFIX = "_bin";

export const ConversionMode = {
  TextToBinary: "text_to_binary_vector",
  BinaryToText: "binary_to_text_vector",
} as const;

export type ConversionMode = (typeof ConversionMode)[keyof typeof ConversionMode];

export function resolveToolchain(inertialFlowPath: string): ToolchainPaths {
  return {
    converter: path.join(inertialFlowPath, CONVERTER_PATH),
    orderingScript: path.join(inertialFlowPath, ORDERING_SCRIPT),
  };
}

export function resolveLayout(dataPath: string, graphName: string): DataLayout {
  const binaryDirectory = path.join(dataPath, BINARY_DIRECTORY);
  const orderingDirectory = path.join(dataPath, ORDERING_DIRECTORY);

  return {
    dataPath,
    graphName,
    binaryDirectory,
    orderingDirectory,
    binaryOrderPath: path.join(
      orderingDirectory,
      `${graphName}${BINARY_ORDER_SUFFIX}`,
    ),
    textOrderPath: path.join(orderingDirectory, graphName),
  };
}

/** Text attribute file as read by the converter */
export function sourceVectorPath(layout: DataLayout, name: string): string {
  return path.join(layout.dataPath, name);
}

export function binaryVectorPath(layout: DataLayout, name: string): string {
  return path.join(layout.binaryDirectory, name);
}

/** The ordering script scans this directory; it expects the trailing slash */
export function binaryDirectoryArgument(layout: DataLayout): string {
  return path.join(layout.binaryDirectory, "/");
}
