import { describe, it, expect, vi } from "vitest";
import { Discoverer, type DiscovererOptions } from "./discoverer.js";
import {
  FakeOrchestrator,
  makeService,
  makeTask,
  silentLogger,
} from "../test/fake-orchestrator.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NETWORKS = new Set(["proxy"]);

function discovererFor(
  orchestrator: FakeOrchestrator,
  overrides?: Partial<DiscovererOptions>,
) {
  return new Discoverer(orchestrator, {
    portLabel: "prometheus.port",
    portEnv: "SERVICE_PORTS",
    monitoringServiceName: "prometheus",
    optOutLabel: "nometrics",
    logger: silentLogger(),
    ...overrides,
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Discoverer.runOnePass", () => {
  it("emits a target for a labelled service on the monitoring network", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ name: "web", labels: { "prometheus.port": "8080" } }),
      [makeTask()],
    );

    const result = await discovererFor(orch).runOnePass(NETWORKS);
    expect(result).toEqual([
      {
        targets: ["10.0.0.5:8080"],
        labels: { job: "web", service_label_prometheus_port: "8080" },
      },
    ]);
  });

  it("resolves the port from SERVICE_PORTS", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ name: "api", container: { labels: {}, env: ["SERVICE_PORTS=9100,9101"] } }),
      [makeTask()],
    );

    const result = await discovererFor(orch).runOnePass(NETWORKS);
    expect(result).toEqual([{ targets: ["10.0.0.5:9100"], labels: { job: "api" } }]);
  });

  it("skips services without a port label or env var", async () => {
    const orch = new FakeOrchestrator().add(makeService({ name: "db" }), [makeTask()]);
    const listTasks = vi.spyOn(orch, "listTasks");

    const result = await discovererFor(orch).runOnePass(NETWORKS);
    expect(result).toEqual([]);
    expect(listTasks).not.toHaveBeenCalled();
  });

  it("never emits the monitoring service itself", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ name: "prometheus", labels: { "prometheus.port": "9090" } }),
      [makeTask()],
    );

    expect(await discovererFor(orch).runOnePass(NETWORKS)).toEqual([]);
  });

  it("logs why the monitoring service is skipped", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ name: "prometheus", labels: { "prometheus.port": "9090" } }),
      [makeTask()],
    );
    const logger = silentLogger();
    const debug = vi.spyOn(logger, "debug");

    await discovererFor(orch, { logger }).runOnePass(NETWORKS);
    expect(debug).toHaveBeenCalledWith(
      { service: "prometheus" },
      "Service is the monitoring service, skipping",
    );
  });

  it("skips a service whose port label is empty", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ name: "web", labels: { "prometheus.port": "" } }),
      [makeTask()],
    );
    const listTasks = vi.spyOn(orch, "listTasks");

    expect(await discovererFor(orch).runOnePass(NETWORKS)).toEqual([]);
    expect(listTasks).not.toHaveBeenCalled();
  });

  it("skips a service whose SERVICE_PORTS starts with an empty entry", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ name: "api", container: { labels: {}, env: ["SERVICE_PORTS=,9100"] } }),
      [makeTask()],
    );

    expect(await discovererFor(orch).runOnePass(NETWORKS)).toEqual([]);
  });

  it("honours a custom monitoring service name", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ name: "mon_prometheus", labels: { "prometheus.port": "9090" } }),
      [makeTask()],
    );

    const result = await discovererFor(orch, {
      monitoringServiceName: "mon_prometheus",
    }).runOnePass(NETWORKS);
    expect(result).toEqual([]);
  });

  it("skips services opted out on the service or container", async () => {
    const logger = silentLogger();
    const debug = vi.spyOn(logger, "debug");
    const orch = new FakeOrchestrator()
      .add(
        makeService({ name: "a", labels: { "prometheus.port": "1", nometrics: "" } }),
        [makeTask()],
      )
      .add(
        makeService({
          name: "b",
          labels: { "prometheus.port": "2" },
          container: { labels: { nometrics: "true" }, env: [] },
        }),
        [makeTask()],
      );

    expect(await discovererFor(orch, { logger }).runOnePass(NETWORKS)).toEqual([]);
    expect(debug).toHaveBeenCalledWith({ service: "a" }, "Service has a 'nometrics' label, skipping");
    expect(debug).toHaveBeenCalledWith({ service: "b" }, "Service has a 'nometrics' label, skipping");
  });

  it("ignores tasks that are not meant to be running", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ labels: { "prometheus.port": "8080" } }),
      [
        makeTask({ id: "old", desiredState: "shutdown" }),
        makeTask({ id: "new", networkAttachments: [{ network: "proxy", addresses: ["10.0.0.9/24"] }] }),
      ],
    );

    const result = await discovererFor(orch).runOnePass(NETWORKS);
    expect(result.map((e) => e.targets[0])).toEqual(["10.0.0.9:8080"]);
  });

  it("skips tasks without network attachments", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ labels: { "prometheus.port": "8080" } }),
      [makeTask({ networkAttachments: undefined }), makeTask({ networkAttachments: [] })],
    );

    expect(await discovererFor(orch).runOnePass(NETWORKS)).toEqual([]);
  });

  it("uses the first eligible attachment and only that one", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ labels: { "prometheus.port": "8080" } }),
      [
        makeTask({
          networkAttachments: [
            { network: "ingress", addresses: ["10.255.0.4/16"] },
            { network: "b", addresses: ["10.0.1.4/24"] },
            { network: "c", addresses: ["10.0.2.4/24"] },
          ],
        }),
      ],
    );

    const result = await discovererFor(orch).runOnePass(new Set(["b", "c"]));
    expect(result).toHaveLength(1);
    expect(result[0].targets).toEqual(["10.0.1.4:8080"]);
  });

  it("emits nothing for a task on no monitoring network", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ labels: { "prometheus.port": "8080" } }),
      [makeTask({ networkAttachments: [{ network: "backend", addresses: ["10.9.0.2/24"] }] })],
    );

    expect(await discovererFor(orch).runOnePass(NETWORKS)).toEqual([]);
  });

  it("logs a task that is on no monitoring network", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ labels: { "prometheus.port": "8080" } }),
      [makeTask({ networkAttachments: [{ network: "backend", addresses: ["10.9.0.2/24"] }] })],
    );
    const logger = silentLogger();
    const debug = vi.spyOn(logger, "debug");

    await discovererFor(orch, { logger }).runOnePass(NETWORKS);
    expect(debug).toHaveBeenCalledWith(
      { service: "web", task: "task-1" },
      "Task is on no monitoring network, skipping",
    );
  });

  it("emits nothing when the first address has no host part", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ labels: { "prometheus.port": "8080" } }),
      [makeTask({ networkAttachments: [{ network: "proxy", addresses: ["/24", "10.0.0.6/24"] }] })],
    );

    expect(await discovererFor(orch).runOnePass(NETWORKS)).toEqual([]);
  });

  it("emits nothing when the matching attachment has no address", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ labels: { "prometheus.port": "8080" } }),
      [makeTask({ networkAttachments: [{ network: "proxy", addresses: [] }] })],
    );

    expect(await discovererFor(orch).runOnePass(NETWORKS)).toEqual([]);
  });

  it("emits one target per running task with container ids", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ labels: { "prometheus.port": "8080" } }),
      [
        makeTask({ id: "t1", containerId: "aaa" }),
        makeTask({
          id: "t2",
          containerId: "bbb",
          networkAttachments: [{ network: "proxy", addresses: ["10.0.0.6/24"] }],
        }),
      ],
    );

    const result = await discovererFor(orch).runOnePass(NETWORKS);
    expect(result.map((e) => [e.targets[0], e.labels.container_id])).toEqual([
      ["10.0.0.5:8080", "aaa"],
      ["10.0.0.6:8080", "bbb"],
    ]);
  });

  it("adds __metrics_path__ from PROM_METRICS_PATH", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({
        container: { labels: {}, env: ["SERVICE_PORTS=3000", "PROM_METRICS_PATH=/stats"] },
      }),
      [makeTask()],
    );

    const [endpoint] = await discovererFor(orch).runOnePass(NETWORKS);
    expect(endpoint.labels.__metrics_path__).toBe("/stats");
  });

  it("keeps listing order across services", async () => {
    const orch = new FakeOrchestrator()
      .add(makeService({ name: "zeta", labels: { "prometheus.port": "1" } }), [makeTask()])
      .add(makeService({ name: "alpha", labels: { "prometheus.port": "2" } }), [makeTask()]);

    const result = await discovererFor(orch).runOnePass(NETWORKS);
    expect(result.map((e) => e.labels.job)).toEqual(["zeta", "alpha"]);
  });

  it("produces identical output for unchanged state", async () => {
    const orch = new FakeOrchestrator()
      .add(
        makeService({
          name: "web",
          labels: { "prometheus.port": "8080", "com.example.tier": "front" },
          container: { labels: { "com.example.team": "ops" }, env: [] },
        }),
        [makeTask({ containerId: "abc" })],
      )
      .add(
        makeService({ name: "api", container: { labels: {}, env: ["SERVICE_PORTS=9100"] } }),
        [makeTask({ id: "t9" })],
      );
    const discoverer = discovererFor(orch);

    const first = JSON.stringify(await discoverer.runOnePass(NETWORKS));
    const second = JSON.stringify(await discoverer.runOnePass(NETWORKS));
    expect(second).toBe(first);
  });

  it("fails the pass when services cannot be listed", async () => {
    const orch = new FakeOrchestrator();
    vi.spyOn(orch, "listServices").mockRejectedValue(new Error("connect ENOENT"));

    await expect(discovererFor(orch).runOnePass(NETWORKS)).rejects.toThrow("connect ENOENT");
  });

  it("fails the pass when a task listing fails", async () => {
    const orch = new FakeOrchestrator().add(
      makeService({ labels: { "prometheus.port": "8080" } }),
      [makeTask()],
    );
    vi.spyOn(orch, "listTasks").mockRejectedValue(new Error("timeout"));

    await expect(discovererFor(orch).runOnePass(NETWORKS)).rejects.toThrow("timeout");
  });
});
