import { describe, expect, it } from "vitest";
import {
  parseAttributesFromPrompt,
  resolveTemplate,
  resolveTemplateKey
} from "../services/promptTemplates.js";

describe("resolveTemplateKey", () => {
  it("maps category synonyms to a template family", () => {
    expect(resolveTemplateKey("Electrical")).toBe("electrical");
    expect(resolveTemplateKey("electronics")).toBe("electrical");
    expect(resolveTemplateKey("  HVAC ")).toBe("hvac");
    expect(resolveTemplateKey("Air Conditioning")).toBe("hvac");
    expect(resolveTemplateKey("cooling")).toBe("hvac");
    expect(resolveTemplateKey("Water")).toBe("plumbing");
    expect(resolveTemplateKey("refrigerant")).toBe("refrigeration");
  });

  it("uses the generic template for unknown or empty categories", () => {
    expect(resolveTemplateKey("Furniture")).toBe("generic");
    expect(resolveTemplateKey("")).toBe("generic");
    expect(resolveTemplateKey(undefined)).toBe("generic");
    expect(resolveTemplateKey(null)).toBe("generic");
  });
});

describe("buildPrompt", () => {
  const context = { mpn: "QO120", manufacturer: "Acme", catSubcat: "Electrical,Breakers" };

  it("carries the part identity and requested attributes", () => {
    const prompt = resolveTemplate("Electrical").buildPrompt(context, ["Voltage", "Material"]);

    expect(prompt).toContain("PRODUCT MPN: QO120\n");
    expect(prompt).toContain("MANUFACTURER: Acme\n");
    expect(prompt).toContain("CATEGORY & SUBCATEGORY: Electrical,Breakers\n");
    expect(prompt).toContain("ATTRIBUTES TO EXTRACT: Voltage, Material\n");
    expect(prompt).toContain("1. Search manufacturer's official website first (Acme.com)");
    expect(prompt).toContain("Data specifically references the exact MPN QO120");
  });

  it("adds the category focus section only for specialised families", () => {
    const electrical = resolveTemplate("Electrical").buildPrompt(context, ["Voltage"]);
    const hvac = resolveTemplate("HVAC").buildPrompt(context, ["Voltage"]);
    const generic = resolveTemplate("Furniture").buildPrompt(context, ["Voltage"]);

    expect(electrical).toContain("MATERIAL IDENTIFICATION REQUIREMENTS:");
    expect(electrical).toContain("Material type is definitively identified");
    expect(hvac).toContain("TECHNICAL SPECIFICATIONS FOCUS:");
    expect(hvac).not.toContain("Material type is definitively identified");
    expect(generic).toContain("Extract comprehensive information about this product by");
    expect(generic).not.toContain("FOCUS:");
    expect(generic).not.toContain("REQUIREMENTS:\n1. CRITICAL");
  });

  it("renders blanks for a missing manufacturer and category", () => {
    const prompt = resolveTemplate(undefined).buildPrompt({ mpn: "X1" }, ["Color"]);

    expect(prompt).toContain("MANUFACTURER: \n");
    expect(prompt).toContain("CATEGORY & SUBCATEGORY: \n");
  });
});

describe("parseAttributesFromPrompt", () => {
  it("recovers the attribute list from a rendered prompt", () => {
    const prompt = resolveTemplate("Plumbing").buildPrompt({ mpn: "P-1" }, [
      "Material",
      "Connection Type",
      "Max Pressure"
    ]);

    expect(parseAttributesFromPrompt(prompt)).toEqual(["Material", "Connection Type", "Max Pressure"]);
  });

  it("returns [] when the prompt has no attribute line", () => {
    expect(parseAttributesFromPrompt("just text")).toEqual([]);
  });
});
