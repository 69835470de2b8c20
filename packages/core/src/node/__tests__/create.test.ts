import { assert, describe, test } from "@loomui/testkit";
import { element, fragment, text } from "../create.js";
import { countNodes, describeNode, nodeAt, nodesEqual, replaceNodeAt } from "../inspect.js";

describe("node constructors", () => {
  test("text coerces numbers", () => {
    assert.deepEqual(text(7), { kind: "text", value: "7" });
  });

  test("element normalizes children", () => {
    const node = element("ul", {}, ["a", 1, null, false, undefined, true, [["b"], text("c")]]);
    assert.deepEqual(
      node.children.map((child) => (child.kind === "text" ? child.value : child.kind)),
      ["a", "1", "b", "c"],
    );
  });

  test("element omits key when absent and keeps it when given", () => {
    assert.equal(Object.hasOwn(element("div"), "key"), false);
    assert.equal(element("li", { key: 3 }).key, 3);
  });

  test("results are frozen", () => {
    const node = element("div", { attributes: { id: "x" } }, ["y"]);
    assert.equal(Object.isFrozen(node), true);
    assert.equal(Object.isFrozen(node.attributes), true);
    assert.equal(Object.isFrozen(node.children), true);
  });

  test("element copies attribute records", () => {
    const attributes: Record<string, string> = { id: "a" };
    const node = element("div", { attributes });
    attributes.id = "b";
    assert.equal(node.attributes.id, "a");
  });

  test("fragment carries its key", () => {
    assert.equal(fragment(["x"], "f").key, "f");
    assert.equal(fragment().children.length, 0);
  });
});

describe("node inspection", () => {
  const tree = element("div", {}, [element("p", { key: "a" }, ["one"]), fragment(["two", "three"])]);

  test("nodesEqual is structural", () => {
    const copy = element("div", {}, [element("p", { key: "a" }, ["one"]), fragment(["two", "three"])]);
    assert.equal(nodesEqual(tree, copy), true);
    assert.equal(nodesEqual(tree, element("div")), false);
  });

  test("nodesEqual compares handlers by identity", () => {
    const a = () => {};
    const b = () => {};
    assert.equal(nodesEqual(element("b", { events: { click: a } }), element("b", { events: { click: a } })), true);
    assert.equal(nodesEqual(element("b", { events: { click: a } }), element("b", { events: { click: b } })), false);
  });

  test("nodeAt walks child indices", () => {
    assert.deepEqual(nodeAt(tree, [1, 0]), text("two"));
    assert.equal(nodeAt(tree, [5]), undefined);
    assert.equal(nodeAt(tree, [0, 0, 0]), undefined);
  });

  test("replaceNodeAt copies only the spine", () => {
    const next = replaceNodeAt(tree, [1, 1], text("THREE"));
    assert.deepEqual(nodeAt(next, [1, 1]), text("THREE"));
    assert.equal(nodeAt(next, [0]), nodeAt(tree, [0]));
    assert.deepEqual(nodeAt(tree, [1, 1]), text("three"));
  });

  test("countNodes and describeNode", () => {
    assert.equal(countNodes(tree), 6);
    assert.equal(describeNode(element("li", { key: 2 })), "li[key=2]");
    assert.equal(describeNode(text("x")), "#text");
    assert.equal(describeNode(fragment()), "#fragment");
  });
});
