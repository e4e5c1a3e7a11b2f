import { describe, expect, test } from "vitest";
import {
  DEFAULT_SHIM_OPTIONS,
  readShimOptions,
  recordOptionSource,
  SHIM_OPTION_DESCRIPTORS,
} from "@inlay/compiler";

describe("readShimOptions", () => {
  test("uses the defaults when nothing is set", () => {
    expect(readShimOptions(recordOptionSource({}))).toEqual({
      diagnostics: false,
      timeoutMs: 1000,
      warningAsError: false,
    });
  });

  test("reads every registered option", () => {
    const options = readShimOptions(
      recordOptionSource({
        "inlay.shimDiagnostics": true,
        "inlay.shimDiagnostics.timeout": 2500,
        warningAsError: true,
      }),
    );
    expect(options).toEqual({ diagnostics: true, timeoutMs: 2500, warningAsError: true });
  });

  test("falls back to the default for wrongly typed values", () => {
    const options = readShimOptions(
      recordOptionSource({
        "inlay.shimDiagnostics": "yes",
        "inlay.shimDiagnostics.timeout": "2500",
        warningAsError: 1,
      }),
    );
    expect(options).toEqual(DEFAULT_SHIM_OPTIONS);
  });

  test("rejects timeouts that are not positive and finite", () => {
    for (const timeout of [0, -5, Number.NaN, Number.POSITIVE_INFINITY]) {
      const options = readShimOptions(recordOptionSource({ "inlay.shimDiagnostics.timeout": timeout }));
      expect(options.timeoutMs).toBe(1000);
    }
  });

  test("ignores inherited keys", () => {
    const source = recordOptionSource(Object.create({ warningAsError: true }));
    expect(source.get("warningAsError")).toBeUndefined();
  });

  test("registers the two shim options and reads the host's warning flag", () => {
    expect(SHIM_OPTION_DESCRIPTORS.map((d) => d.name)).toEqual([
      "inlay.shimDiagnostics",
      "inlay.shimDiagnostics.timeout",
      "warningAsError",
    ]);
  });
});
