import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { stat } from "fs/promises";
import path from "node:path";
import { buildOrderingArgs, order } from "./ordering";
import {
  RecordingRunner,
  createTempDir,
  removeTempDir,
  testContext,
} from "../test-utils";

describe("buildOrderingArgs", () => {
  it("prefixes the script with the interpreter", () => {
    expect(
      buildOrderingArgs(
        ["python3"],
        "/tools/inertialflowcutter_order.py",
        "/d/binary/",
        "/d/ordering/europe_bin",
      ),
    ).toEqual([
      "python3",
      "/tools/inertialflowcutter_order.py",
      "/d/binary/",
      "/d/ordering/europe_bin",
    ]);
  });

  it("keeps interpreter arguments in place", () => {
    expect(
      buildOrderingArgs(["python3", "-u"], "/t/order.py", "/d/binary/", "/d/ordering/g_bin"),
    ).toEqual(["python3", "-u", "/t/order.py", "/d/binary/", "/d/ordering/g_bin"]);
  });
});

describe("order", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("requires the binary vectors from the conversion phase", async () => {
    const runner = new RecordingRunner();
    const ctx = testContext(dir, runner);

    await expect(order(ctx)).rejects.toThrow("Binary conversion must run before ordering");
    expect(runner.calls).toEqual([]);
  });

  it("creates ordering/ and runs the script over binary/", async () => {
    const runner = new RecordingRunner();
    const ctx = { ...testContext(dir, runner), binaryVectors: [] };

    await order(ctx);

    expect((await stat(path.join(dir, "ordering"))).isDirectory()).toBe(true);
    expect(runner.calls).toEqual([
      [
        "python3",
        "/tools/inertialflowcutter_order.py",
        `${dir}/binary/`,
        `${dir}/ordering/berlin_bin`,
      ],
    ]);
    expect(ctx.binaryOrderPath).toBe(path.join(dir, "ordering", "berlin_bin"));
  });
});
