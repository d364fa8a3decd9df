import { IdentifierResolver } from "../src/core/identifierResolver";

describe("IdentifierResolver", () => {
  test("binds the item id to the call id", () => {
    const onMigrate = jest.fn();
    const resolver = new IdentifierResolver(onMigrate);

    expect(resolver.canonicalize("call_1", "fc_1")).toBe("call_1");
    expect(resolver.resolve("fc_1")).toBe("call_1");
    expect(resolver.resolve("call_1")).toBe("call_1");
    expect(onMigrate).not.toHaveBeenCalled();
  });

  test("falls back to the item id when no call id is known", () => {
    const resolver = new IdentifierResolver(jest.fn());

    expect(resolver.canonicalize(undefined, "fc_2")).toBe("fc_2");
    expect(resolver.canonicalize("", "fc_2")).toBe("fc_2");
    expect(resolver.size).toBe(1);
  });

  test("migrates an item-keyed call once its call id shows up", () => {
    const onMigrate = jest.fn();
    const resolver = new IdentifierResolver(onMigrate);

    resolver.canonicalize(undefined, "fc_3");
    expect(resolver.canonicalize("call_3", "fc_3")).toBe("call_3");

    expect(onMigrate).toHaveBeenCalledTimes(1);
    expect(onMigrate).toHaveBeenCalledWith("fc_3", "call_3");
    expect(resolver.resolve("fc_3")).toBe("call_3");
  });

  test("trims identifiers and rejects calls with none", () => {
    const resolver = new IdentifierResolver(jest.fn());

    expect(resolver.canonicalize("  call_4 ", "")).toBe("call_4");
    expect(resolver.canonicalize(" ", " ")).toBeNull();
    expect(resolver.canonicalize(undefined, undefined)).toBeNull();
  });

  test("forget drops every alias of a canonical id", () => {
    const resolver = new IdentifierResolver(jest.fn());
    resolver.canonicalize("call_5", "fc_5");
    resolver.canonicalize("call_6", "fc_6");

    resolver.forget(["call_5"]);

    expect(resolver.resolve("fc_5")).toBeUndefined();
    expect(resolver.resolve("call_5")).toBeUndefined();
    expect(resolver.resolve("fc_6")).toBe("call_6");
    expect(resolver.size).toBe(2);
  });
});
