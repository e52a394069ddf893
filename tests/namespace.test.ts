import { describe, expect, test } from "vitest";
import { Namespace, NamespaceTable, isTalkNamespace, normalizeTitle } from "../packages/core/src/models/namespace.js";

describe("namespace table", () => {
  const table = NamespaceTable.defaults();

  test("resolves canonical prefixes case-insensitively", () => {
    expect(table.namespaceOf("Template:Infobox")).toBe(Namespace.Template);
    expect(table.namespaceOf("user talk:Alice")).toBe(Namespace.UserTalk);
    expect(table.namespaceOf("User_talk:Alice")).toBe(Namespace.UserTalk);
    expect(table.namespaceOf("Plain title")).toBe(Namespace.Main);
    expect(table.namespaceOf(":Leading colon")).toBe(Namespace.Main);
  });

  test("strips and adds prefixes", () => {
    expect(table.stripNamespace("File:Logo.png")).toBe("Logo.png");
    expect(table.stripNamespace("Ratio: 3:4")).toBe("Ratio: 3:4");
    expect(table.inNamespace(Namespace.Category, "Stubs")).toBe("Category:Stubs");
    expect(table.inNamespace(Namespace.Main, "Stubs")).toBe("Stubs");
  });

  test("survives a record round trip with aliases", () => {
    const local = new NamespaceTable([[0, ""], [6, "Datei"]], [["Bild", 6], ["File", 6]]);
    const restored = NamespaceTable.fromRecord(local.toRecord());
    expect(restored.nameOf(6)).toBe("Datei");
    expect(restored.namespaceOf("Bild:X.png")).toBe(6);
    expect(restored.namespaceOf("File:X.png")).toBe(6);
  });

  test("classifies talk namespaces", () => {
    expect(isTalkNamespace(Namespace.Talk)).toBe(true);
    expect(isTalkNamespace(Namespace.Category)).toBe(false);
    expect(isTalkNamespace(Namespace.Special)).toBe(false);
  });

  test("normalizes titles", () => {
    expect(normalizeTitle("  Main_Page ")).toBe("Main Page");
  });
});
