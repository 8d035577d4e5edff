import test from "node:test";
import assert from "node:assert/strict";
import { InMemoryBroker } from "./broker/memory-broker.js";
import { loadWorkerConfig } from "./config.js";
import { silentLogger } from "./logger.js";
import { buildFakeCoordinator } from "./testing/fake-coordinator.js";
import { waitFor } from "./testing/wait.js";
import { createWorkerNode } from "./worker-node.js";

test("worker node serves the echo kind and records telemetry", async () => {
  const config = loadWorkerConfig({ TASKLINE_WORKER_NAME: "node-1", TASKLINE_REPORT_RUNNING: "true" });
  const coordinator = buildFakeCoordinator();
  const broker = new InMemoryBroker();
  const { engine, telemetry } = createWorkerNode(config, {
    logger: silentLogger(),
    coordinator: coordinator.client(),
    brokerFactory: () => broker,
  });

  assert.deepEqual(engine.kinds, ["echo"]);
  assert.equal(engine.brokerBackend, "amqp");

  const running = engine.run();
  await waitFor(() => engine.state === "active");
  broker.publish({ taskId: "n1", kind: "echo", payload: { hello: "world" } });
  await waitFor(() => coordinator.callsTo("/tasks/n1/result").length === 1);
  await engine.shutdown();
  await running;

  assert.deepEqual(coordinator.calls[0]?.body, { name: "node-1", task_kinds: ["echo"] });
  assert.deepEqual(
    coordinator.callsTo("/tasks/n1").map((c) => c.body),
    ["running", { data: { hello: "world" }, is_error: false }]
  );
  const { counters } = telemetry.snapshot();
  assert.equal(counters["event.task.succeeded"], 1);
  assert.equal(counters["event.worker.unregistered"], 1);
});
