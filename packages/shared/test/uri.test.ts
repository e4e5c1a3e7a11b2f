import { describe, expect, test } from "vitest";
import { URI } from "vscode-uri";
import { shimDocumentUri } from "@inlay/shared";

describe("shimDocumentUri", () => {
  test("places the shim document beside the host file", () => {
    expect(shimDocumentUri("/work/src/main.inl")).toBe("file:///work/src/nul");
  });

  test("accepts another virtual file name", () => {
    expect(shimDocumentUri("/work/src/main.inl", "shim.c")).toBe("file:///work/src/shim.c");
  });

  test("round-trips through the file system path", () => {
    expect(URI.parse(shimDocumentUri("/work/src/main.inl")).fsPath).toBe("/work/src/nul");
  });
});
