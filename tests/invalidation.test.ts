import { ComputationGraph, NodeId, UnsetInputError } from 'memograph';
import { add, counted } from './utils/test-helpers';

describe("ComputationGraph - invalidation", () => {
  it("should mark only the dependents of a changed input stale", () => {
    const graph = new ComputationGraph<number>();
    const x1 = graph.addInputNode("x1");
    const x2 = graph.addInputNode("x2");
    const x3 = graph.addInputNode("x3");
    const x4 = graph.addInputNode("x4");
    for (const name of ["x1", "x2", "x3", "x4"]) {
      graph.setInput(name, 1);
    }

    const node1 = graph.addNode([x3, x4], add);
    const node2 = graph.addNode([x2, node1], add);
    const node3 = graph.addNode([x1, node2], add);

    expect(graph.compute(node3)).toBe(4);
    expect(graph.cached(node1)).toBe(2);

    graph.setInput("x2", 2);

    expect(graph.cached(node1)).toBe(2);
    expect(graph.isStale(node2)).toBe(true);
    expect(graph.isStale(node3)).toBe(true);

    expect(graph.compute(node2)).toBe(4);
    expect(graph.cached(node1)).toBe(2);
    expect(graph.cached(node2)).toBe(4);
    expect(graph.isStale(node3)).toBe(true);
    // Inputs outside the changed branch are untouched
    expect(graph.cached(x1)).toBe(1);
    expect(graph.cached(x3)).toBe(1);
  });

  it("should reach every transitive dependent", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    const b = graph.addInputNode("b");
    const chain: NodeId[] = [];
    let previous = a;
    for (let i = 0; i < 5; i++) {
      previous = graph.addNode([previous, b], add);
      chain.push(previous);
    }
    const unrelated = graph.addNode([b], ([v]) => v * 10);

    graph.setInput("a", 1);
    graph.setInput("b", 1);
    graph.compute(chain[4]);
    graph.compute(unrelated);

    graph.setInput("a", 2);

    expect(chain.every(id => graph.isStale(id))).toBe(true);
    expect(graph.cached(unrelated)).toBe(10);
    expect(graph.compute(chain[4])).toBe(7);
  });

  it("should visit each node of a diamond once", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    const left = graph.addNode([a], ([v]) => v + 1);
    const right = graph.addNode([a], ([v]) => v * 2);
    const bottom = graph.addNode([left, right], add);

    const invalidated = graph.invalidate(a);

    expect(invalidated.map(id => id.index)).toEqual([a.index, left.index, right.index, bottom.index]);
    expect(graph.getStats().invalidationCount).toBe(4);
  });

  it("should stay linear on stacked diamonds", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    let top = a;
    for (let layer = 0; layer < 40; layer++) {
      const left = graph.addNode([top], ([v]) => v);
      const right = graph.addNode([top], ([v]) => v);
      top = graph.addNode([left, right], add);
    }

    // Path count doubles per layer; node count grows by three
    expect(graph.invalidate(a)).toHaveLength(1 + 40 * 3);
  });

  it("should clear the value of an invalidated input", () => {
    const graph = new ComputationGraph<number>();
    const x = graph.addInputNode("x");
    const square = graph.addNode([x], ([v]) => v * v);
    graph.setInput("x", 3);
    expect(graph.compute(square)).toBe(9);

    graph.invalidate(x);

    expect(graph.isStale(x)).toBe(true);
    expect(() => graph.compute(square)).toThrow(UnsetInputError);

    graph.setInput("x", 4);
    expect(graph.compute(square)).toBe(16);
  });

  it("should leave the inputs of an invalidated operation fresh", () => {
    const graph = new ComputationGraph<number>();
    const x = graph.addInputNode("x");
    const double = counted<number>(([v]) => v * 2);
    const doubled = graph.addNode([x], double.op);
    const plusOne = graph.addNode([doubled], ([v]) => v + 1);
    graph.setInput("x", 5);
    expect(graph.compute(plusOne)).toBe(11);

    const invalidated = graph.invalidate(doubled);

    expect(invalidated.map(id => id.index)).toEqual([doubled.index, plusOne.index]);
    expect(graph.cached(x)).toBe(5);
    expect(graph.compute(plusOne)).toBe(11);
    expect(double.calls()).toBe(2);
  });
});
