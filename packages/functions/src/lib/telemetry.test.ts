import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { SchemeCreateResponse } from "imagescheme-shared";
import { SchemeError } from "./errors";
import { trackSchemeFailed, trackSchemeGenerated } from "./telemetry";

const result: SchemeCreateResponse = {
  scheme: { author: "Test Author", name: "Test", slug: "test", system: "base16", variant: "dark", palette: {} },
  palette: [],
  anchors: {
    light: { hex: "FFFFFF", pass: 1, description: "light with low saturation" },
    dark: { hex: "000000", pass: 3, description: "dark, any saturation" },
    background: "000000",
    foreground: "FFFFFF",
  },
};

describe("telemetry", () => {
  it("never throws from the scheme wrappers", () => {
    assert.doesNotThrow(() => trackSchemeGenerated(result, 12));
    assert.doesNotThrow(() => trackSchemeFailed(new SchemeError("NoColors", "Failed to find colors on image")));
  });
});
