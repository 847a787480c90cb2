import { describe, it, expect, vi } from "vitest";

const dotenvConfig = vi.hoisted(() => vi.fn());
vi.mock("dotenv", () => ({ default: { config: dotenvConfig } }));

import { APP_NAME, APP_VERSION, StructuralChange, EuclideanDivergence } from "./index.js";

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Structural Change Analyzer");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });

  it("should export the engine and divergence policies", () => {
    const output = new StructuralChange(1).calculateVectors([[0], [2]], new EuclideanDivergence());
    expect(output).toEqual([[-2], [2]]);
  });

  it("does not read .env when imported as a library", () => {
    expect(dotenvConfig).not.toHaveBeenCalled();
  });
});
