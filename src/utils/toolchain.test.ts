import { describe, it, expect } from "vitest";
import {
  binaryDirectoryArgument,
  binaryVectorPath,
  resolveLayout,
  resolveToolchain,
  sourceVectorPath,
} from "./toolchain";

describe("resolveLayout", () => {
  it("derives every output path from the data path and graph name", () => {
    const layout = resolveLayout("/d", "europe");

    expect(layout).toEqual({
      dataPath: "/d",
      graphName: "europe",
      binaryDirectory: "/d/binary",
      orderingDirectory: "/d/ordering",
      binaryOrderPath: "/d/ordering/europe_bin",
      textOrderPath: "/d/ordering/europe",
    });
  });

  it("places attribute vectors beside and under binary/", () => {
    const layout = resolveLayout("/d", "europe");

    expect(sourceVectorPath(layout, "latitude")).toBe("/d/latitude");
    expect(binaryVectorPath(layout, "latitude")).toBe("/d/binary/latitude");
  });

  it("keeps the trailing slash on the binary directory argument", () => {
    expect(binaryDirectoryArgument(resolveLayout("/d", "europe"))).toBe("/d/binary/");
  });

  it("normalizes a trailing slash on the data path", () => {
    const layout = resolveLayout("/d/", "europe");

    expect(binaryVectorPath(layout, "latitude")).toBe("/d/binary/latitude");
    expect(layout.binaryOrderPath).toBe("/d/ordering/europe_bin");
  });
});

describe("resolveToolchain", () => {
  it("locates the console tool and the ordering script", () => {
    expect(resolveToolchain("/tools")).toEqual({
      converter: "/tools/build/console",
      orderingScript: "/tools/inertialflowcutter_order.py",
    });
  });
});
