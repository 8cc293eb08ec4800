import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm } from "fs/promises";
import path from "node:path";
import { verify } from "./verifier";
import { serializeNetwork } from "./serializer";
import { MissingInputError } from "../utils";
import {
  RecordingRunner,
  TRIANGLE,
  createTempDir,
  removeTempDir,
  testContext,
} from "../test-utils";

describe("verify", () => {
  let graph: string;

  beforeEach(async () => {
    graph = await createTempDir();
    await serializeNetwork(TRIANGLE, graph);
  });

  afterEach(async () => {
    await removeTempDir(graph);
  });

  it("passes when every attribute file is present", async () => {
    await expect(verify(testContext(graph, new RecordingRunner()))).resolves.toBeUndefined();
  });

  it("lists every missing attribute file in order", async () => {
    await rm(path.join(graph, "head"));
    await rm(path.join(graph, "longitude"));

    await expect(verify(testContext(graph, new RecordingRunner()))).rejects.toMatchObject({
      code: "ERR_INPUT_MISSING",
      missing: [path.join(graph, "head"), path.join(graph, "longitude")],
    });
  });

  it("treats a directory in place of an attribute file as missing", async () => {
    await rm(path.join(graph, "latitude"));
    await mkdir(path.join(graph, "latitude"));

    await expect(verify(testContext(graph, new RecordingRunner()))).rejects.toBeInstanceOf(
      MissingInputError,
    );
  });
});
