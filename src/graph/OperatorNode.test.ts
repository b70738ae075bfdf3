import { cloneOperatorNode, createOperatorNode, DEFAULT_RESOLUTION, presentParents } from "./OperatorNode";

describe("OperatorNode", () => {
  it("should fill defaults", () => {
    const node = createOperatorNode({ filterId: 3 });

    expect(node.resolution).toBe(DEFAULT_RESOLUTION);
    expect(node.kind).toBe("filter");
    expect(node.hdr).toBe(false);
    expect(node.seed).toBe(0);
    expect(node.parents).toEqual([null, null, null]);
    expect(Array.from(node.parameters)).toEqual(new Array(16).fill(0));
    expect(node.persist).toBe(false);
    expect(node.auxiliary).toBeNull();
  });

  it("pads short parameter lists and truncates long ones", () => {
    expect(Array.from(createOperatorNode({ filterId: 0, parameters: [1, 2] }).parameters.slice(0, 3))).toEqual([1, 2, 0]);
    expect(createOperatorNode({ filterId: 0, parameters: new Array(20).fill(9) }).parameters).toHaveLength(16);
  });

  it("should reject more than three parents", () => {
    expect(() => createOperatorNode({ filterId: 0, parents: [0, 1, 2, 3] })).toThrow(
      "A node takes at most 3 parents, got 4",
    );
  });

  it("clones parents and parameters", () => {
    const node = createOperatorNode({ filterId: 0, parents: [1], parameters: [7] });
    const copy = cloneOperatorNode(node);
    copy.parameters[0] = 9;
    copy.parents[0] = 2;

    expect(node.parameters[0]).toBe(7);
    expect(node.parents[0]).toBe(1);
  });

  it("should list present parents in slot order", () => {
    expect(presentParents(createOperatorNode({ filterId: 0, parents: [null, 4, 2] }))).toEqual([4, 2]);
  });
});
