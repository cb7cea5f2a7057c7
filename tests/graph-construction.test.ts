import {
  ComputationGraph,
  DuplicateInputNameError,
  InvalidReferenceError,
  NotAnInputNodeError,
} from 'memograph';
import { add } from './utils/test-helpers';

describe("ComputationGraph - topology construction", () => {
  it("should create unset input nodes", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode();

    expect(graph.isStale(a)).toBe(true);
    expect(graph.cached(a)).toBeUndefined();
    expect(graph.inputsOf(a)).toEqual([]);
  });

  it("should record reverse edges for every input", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    const b = graph.addInputNode("b");
    const sum = graph.addNode([a, b], add);
    const product = graph.addNode([sum, a], ([x, y]) => x * y);

    expect(graph.dependentsOf(a).map(id => id.index)).toEqual([sum.index, product.index]);
    expect(graph.dependentsOf(b).map(id => id.index)).toEqual([sum.index]);
    expect(graph.dependentsOf(sum).map(id => id.index)).toEqual([product.index]);
    expect(graph.dependentsOf(product)).toEqual([]);
    expect(graph.inputsOf(product).map(id => id.index)).toEqual([sum.index, a.index]);
    expect(graph.size).toBe(4);
  });

  it("should keep one reverse edge when an input is listed twice", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    const doubled = graph.addNode([a, a], add);

    expect(graph.dependentsOf(a).map(id => id.index)).toEqual([doubled.index]);

    graph.setInput("a", 3);
    expect(graph.compute(doubled)).toBe(6);
  });

  it("should accept operation nodes without inputs", () => {
    const graph = new ComputationGraph<number>();
    const constant = graph.addNode([], () => 42);

    expect(graph.compute(constant)).toBe(42);
  });

  it("should reject inputs that belong to another graph", () => {
    const graph = new ComputationGraph<number>();
    const other = new ComputationGraph<number>();
    graph.addInputNode("a");
    const foreign = other.addInputNode("a");

    expect(() => graph.addNode([foreign], ([x]) => x)).toThrow(InvalidReferenceError);
    expect(graph.size).toBe(1);
    expect(graph.dependentsOf(graph.getInputId("a"))).toEqual([]);
  });

  it("should register names for unnamed inputs", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode();
    graph.registerInput("rate", a);

    expect(graph.getInputId("rate")).toBe(a);
    graph.setInput("rate", 7);
    expect(graph.cached(a)).toBe(7);
  });

  it("should allow several names for one input", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("primary");
    graph.registerInput("alias", a);

    graph.setInput("alias", 2);
    expect(graph.cached(a)).toBe(2);
    expect(graph.inputNames()).toEqual(["primary", "alias"]);
  });

  it("should count input nodes rather than their names", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("primary");
    graph.registerInput("alias", a);
    const unnamed = graph.addInputNode();
    graph.addNode([a, unnamed], add);

    const stats = graph.getStats();
    expect(stats.inputsCount).toBe(2);
    expect(stats.nodesCount).toBe(3);
  });

  it("should refuse duplicate input names", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("x");
    const b = graph.addInputNode();

    expect(() => graph.addInputNode("x")).toThrow(DuplicateInputNameError);
    expect(() => graph.registerInput("x", b)).toThrow(DuplicateInputNameError);
    // No orphan node was appended by the failed addInputNode
    expect(graph.size).toBe(2);
    expect(graph.getInputId("x")).toBe(a);
  });

  it("should refuse to name an operation node", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    const op = graph.addNode([a], ([x]) => x);

    expect(() => graph.registerInput("op", op)).toThrow(NotAnInputNodeError);
    expect(graph.hasInput("op")).toBe(false);
  });

  it("should export the structure and cached values", () => {
    const graph = new ComputationGraph<number>({ graphId: "export" });
    const a = graph.addInputNode("a");
    const b = graph.addInputNode();
    const sum = graph.addNode([a, b], add);

    graph.setInput("a", 1);
    graph.setInputNode(b, 2);
    graph.compute(sum);

    const state = graph.exportState();
    expect(state.graphId).toBe("export");
    expect(state.nodes).toEqual([
      { index: 0, kind: "input", name: "a", inputs: [], dependents: [2], stale: false, value: 1 },
      { index: 1, kind: "input", inputs: [], dependents: [2], stale: false, value: 2 },
      { index: 2, kind: "operation", inputs: [0, 1], dependents: [], stale: false, value: 3 },
    ]);
  });
});
