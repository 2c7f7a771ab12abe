import { parseKeyDescriptor } from "./keyDescriptor.utils";

describe("parseKeyDescriptor", () => {
  it("splits a primary key from its modifiers", () => {
    expect(parseKeyDescriptor("Cmd+Shift+T")).toEqual({
      key: "T",
      modifiers: ["Meta", "Shift"],
    });
  });

  it("accepts a bare key", () => {
    expect(parseKeyDescriptor("Enter")).toEqual({ key: "Enter", modifiers: [] });
  });

  it("tolerates whitespace and lowercase aliases", () => {
    expect(parseKeyDescriptor(" ctrl + c ")).toEqual({
      key: "c",
      modifiers: ["Control"],
    });
  });

  it("treats a trailing plus as the plus key", () => {
    expect(parseKeyDescriptor("Ctrl++")).toEqual({
      key: "+",
      modifiers: ["Control"],
    });
  });

  it("collapses repeated modifiers", () => {
    expect(parseKeyDescriptor("Ctrl+Control+A").modifiers).toEqual(["Control"]);
  });

  it("rejects unknown modifiers", () => {
    expect(() => parseKeyDescriptor("Hyper+K")).toThrow(
      "Unknown modifier 'Hyper' in key descriptor 'Hyper+K'",
    );
  });

  it("rejects empty segments", () => {
    expect(() => parseKeyDescriptor("Ctrl++T")).toThrow(/empty segment/);
  });

  it("rejects an empty descriptor", () => {
    expect(() => parseKeyDescriptor("   ")).toThrow("Key descriptor is empty");
  });
});
