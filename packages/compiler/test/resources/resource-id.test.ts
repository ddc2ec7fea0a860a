import { describe, test, expect } from "vitest";

import { parseResourceId } from "../../src/index.js";
import { WIDGET_ID } from "../_helpers/widgets.js";

describe("parseResourceId", () => {
  test("reads a resource group scoped id", () => {
    expect(parseResourceId(WIDGET_ID)).toEqual({
      fullyQualifiedId: WIDGET_ID,
      fullyQualifiedType: "Test.Widgets/widgets",
      nameHierarchy: ["widget-01"],
      subscriptionId: "sub-1",
      resourceGroup: "rg-1",
    });
  });

  test("reads child resources", () => {
    const id = parseResourceId("/subscriptions/sub-1/providers/Test.Network/nets/net-a/subnets/sub-b");
    expect(id?.fullyQualifiedType).toBe("Test.Network/nets/subnets");
    expect(id?.nameHierarchy).toEqual(["net-a", "sub-b"]);
    expect(id?.resourceGroup).toBeNull();
  });

  test("matches keywords case-insensitively and trims trailing slashes", () => {
    const id = parseResourceId(" /SUBSCRIPTIONS/s/RESOURCEGROUPS/g/PROVIDERS/Test.Widgets/widgets/w// ");
    expect(id).toMatchObject({ fullyQualifiedId: "/SUBSCRIPTIONS/s/RESOURCEGROUPS/g/PROVIDERS/Test.Widgets/widgets/w", resourceGroup: "g" });
  });

  test("uses the last providers section of an extension resource", () => {
    const id = parseResourceId(`${WIDGET_ID}/providers/Test.Locks/locks/lock-1`);
    expect(id?.fullyQualifiedType).toBe("Test.Locks/locks");
    expect(id?.nameHierarchy).toEqual(["lock-1"]);
  });

  test.each([
    [""],
    ["subscriptions/sub-1/providers/Test.Widgets/widgets/w"],
    ["/subscriptions/sub-1/resourceGroups/rg-1"],
    ["/providers/Test.Widgets/widgets"],
    ["/providers/Test.Widgets/widgets/w/children"],
    ["/providers//widgets/w"],
  ])("rejects %j", (text) => {
    expect(parseResourceId(text)).toBeNull();
  });

  test("returns a frozen value", () => {
    expect(Object.isFrozen(parseResourceId(WIDGET_ID))).toBe(true);
  });
});
