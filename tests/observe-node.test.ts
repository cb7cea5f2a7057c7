import { firstValueFrom } from 'rxjs';
import {
  ComputationGraph,
  GraphEventType,
  LogLevel,
  NodeComputeError,
  NodeId,
  createGraph,
  withInputs,
  withNodes,
} from 'memograph';
import { add } from './utils/test-helpers';
import { TestLoggerAdapter } from './utils/test-logger-adapter';

describe("ComputationGraph - observeNode", () => {
  it("should emit the current value and every recomputation", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    const b = graph.addInputNode("b");
    graph.addInputNode("c");
    const sum = graph.addNode([a, b], add);
    graph.setInput("a", 1);
    graph.setInput("b", 2);

    const values: number[] = [];
    const subscription = graph.observeNode(sum).subscribe(value => values.push(value));
    expect(values).toEqual([3]);

    graph.setInput("a", 5);
    graph.setInput("c", 100);
    expect(values).toEqual([3, 7]);

    subscription.unsubscribe();
    graph.setInput("b", 0);
    expect(values).toEqual([3, 7]);
  });

  it("should resolve with the current value", async () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    const doubled = graph.addNode([a], ([v]) => v * 2);
    graph.setInput("a", 21);

    await expect(firstValueFrom(graph.observeNode(doubled))).resolves.toBe(42);
  });

  it("should wait for unset inputs", () => {
    const graph = new ComputationGraph<number>({ silentErrors: true });
    const a = graph.addInputNode("a");
    const doubled = graph.addNode([a], ([v]) => v * 2);

    const values: number[] = [];
    graph.observeNode(doubled).subscribe(value => values.push(value));
    expect(values).toEqual([]);

    graph.setInput("a", 4);
    expect(values).toEqual([8]);
  });

  it("should not report waiting on unset inputs as a failure", () => {
    const logger = new TestLoggerAdapter(LogLevel.DEBUG);
    const graph = new ComputationGraph<number>({ graphId: "g", logger });
    const a = graph.addInputNode("a");
    const b = graph.addInputNode("b");
    const sum = graph.addNode([a, b], add);
    const failures: NodeId[] = [];
    graph.on(GraphEventType.NODE_COMPUTE_ERROR, nodeId => failures.push(nodeId));

    const values: number[] = [];
    graph.observeNode(sum).subscribe(value => values.push(value));
    graph.setInput("a", 1);
    graph.setInput("b", 2);

    expect(values).toEqual([3]);
    expect(graph.getStats().errorCount).toBe(0);
    expect(failures).toEqual([]);
    expect(logger.messages(LogLevel.ERROR)).toEqual([]);
    expect(logger.messages(LogLevel.DEBUG).filter(message => message.includes("observe-skipped"))).toEqual([
      `[EVENT][graph][observe-skipped] {"graphId":"g","node":2,"reason":"Input 'a' has no value"}`,
      `[EVENT][graph][observe-skipped] {"graphId":"g","node":2,"reason":"Input 'b' has no value"}`,
    ]);
  });

  it("should emit again when an input is set to the same value", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    const doubled = graph.addNode([a], ([v]) => v * 2);
    graph.setInput("a", 1);

    const values: number[] = [];
    graph.observeNode(doubled).subscribe(value => values.push(value));
    graph.setInput("a", 1);

    expect(values).toEqual([2, 2]);
    expect(graph.getStats().computeCount).toBe(2);
  });

  it("should error when the node's function throws", () => {
    const graph = new ComputationGraph<number>({ silentErrors: true });
    const x = graph.addInputNode("x");
    const root = graph.addNode([x], ([v]) => {
      if (v < 0) {
        throw new Error("negative input");
      }
      return Math.sqrt(v);
    });
    graph.setInput("x", 1);

    const values: number[] = [];
    const errors: unknown[] = [];
    graph.observeNode(root).subscribe({
      next: value => values.push(value),
      error: error => errors.push(error),
    });
    graph.setInput("x", -1);

    expect(values).toEqual([1]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(NodeComputeError);
    expect(graph.getStats().errorCount).toBe(1);
  });

  it("should complete when the graph is destroyed", () => {
    const graph = new ComputationGraph<number>();
    const a = graph.addInputNode("a");
    graph.setInput("a", 1);

    const complete = jest.fn();
    graph.observeNode(a).subscribe({ complete });
    graph.destroy();

    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("should observe nodes by key through the Build API", () => {
    const graph = createGraph<number>(
      withInputs({ price: 10, quantity: 2 }),
      withNodes<number>([{ id: "total", inputs: ["price", "quantity"], compute: ([p, q]) => p * q }])
    );

    const values: number[] = [];
    graph.observe("total").subscribe(value => values.push(value));
    graph.set("quantity", 3);

    expect(values).toEqual([20, 30]);
  });
});
