import { describe, expect, it } from "vitest";
import { isInspectionProvider, isProviderConstructor } from "../../src/providers/contract.js";
import { HeuristicProvider } from "../../src/providers/heuristic/heuristic-provider.js";
import { OpaProvider } from "../../src/providers/opa/opa-provider.js";

class PartialProvider {
  readonly name = "partial";
  readonly description = "missing analyzeConfig";
  isAvailable(): boolean {
    return true;
  }
  async analyzeTool(): Promise<never[]> {
    return [];
  }
}

describe("provider contract", () => {
  it("accepts the built-in providers", () => {
    expect(isInspectionProvider(new HeuristicProvider())).toBe(true);
    expect(isInspectionProvider(new OpaProvider())).toBe(true);
    expect(isProviderConstructor(HeuristicProvider)).toBe(true);
  });

  it("accepts plain objects that satisfy the contract", () => {
    expect(
      isInspectionProvider({
        name: "inline",
        description: "",
        isAvailable: () => true,
        analyzeTool: async () => [],
        analyzeConfig: async () => [],
      }),
    ).toBe(true);
  });

  it("rejects incomplete providers", () => {
    expect(isInspectionProvider(new PartialProvider())).toBe(false);
    expect(isProviderConstructor(PartialProvider)).toBe(false);
    expect(
      isInspectionProvider({
        name: " ",
        description: "blank name",
        isAvailable: () => true,
        analyzeTool: async () => [],
        analyzeConfig: async () => [],
      }),
    ).toBe(false);
    expect(isInspectionProvider(null)).toBe(false);
  });

  it("rejects values that are not classes", () => {
    expect(isProviderConstructor({})).toBe(false);
    expect(isProviderConstructor(() => undefined)).toBe(false);
    expect(isProviderConstructor("HeuristicProvider")).toBe(false);
  });
});
