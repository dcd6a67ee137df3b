import { describe, expect, it } from "vitest";
import { deriveState, mapConfig, mapHostConfig, mapState, serializeValue } from "../../src/inventory/mapper.js";
import type { DiagnosticEvent, DiagnosticSink } from "../../src/inventory/diagnostics.js";
import type { InventoryRecord } from "../../src/inventory/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function recordingSink(): DiagnosticSink & { events: DiagnosticEvent[] } {
  const events: DiagnosticEvent[] = [];
  return {
    events,
    emit: (event) => {
      events.push(event);
    },
  };
}

// ---------------------------------------------------------------------------
// State derivation
// ---------------------------------------------------------------------------

describe("deriveState", () => {
  it("reports Failed for any non-zero exit code regardless of flags", () => {
    expect(deriveState(1, true, true)).toBe("Failed");
    expect(deriveState(1, false, false)).toBe("Failed");
    expect(deriveState(137, 1, 0)).toBe("Failed");
  });

  it("reports Running when exit code is zero and running is set", () => {
    expect(deriveState(0, 1, 0)).toBe("Running");
    expect(deriveState(0, true, true)).toBe("Running");
  });

  it("reports Paused when not running but paused", () => {
    expect(deriveState(0, 0, 1)).toBe("Paused");
    expect(deriveState(0, false, true)).toBe("Paused");
  });

  it("reports Stopped when neither flag is set", () => {
    expect(deriveState(0, 0, 0)).toBe("Stopped");
    expect(deriveState(0, undefined, undefined)).toBe("Stopped");
  });

  it("does not treat truthy strings as set flags", () => {
    expect(deriveState(0, "false", "yes")).toBe("Stopped");
  });
});

// ---------------------------------------------------------------------------
// Config block
// ---------------------------------------------------------------------------

describe("mapConfig", () => {
  it("copies hostname and serializes Env and Cmd verbatim", () => {
    const record: InventoryRecord = {};
    const sink = recordingSink();
    mapConfig(
      record,
      { Id: "c1", Config: { Hostname: "web1", Env: ["A=1", null, ["nested"]], Cmd: ["nginx", "-g", "daemon off;"] } },
      sink,
    );

    expect(record.containerHostname).toBe("web1");
    expect(record.environmentVar).toBe('["A=1",null,["nested"]]');
    expect(record.command).toBe('["nginx","-g","daemon off;"]');
    expect(sink.events).toEqual([]);
  });

  it("serializes an explicit null Cmd as the text null", () => {
    const record: InventoryRecord = {};
    mapConfig(record, { Config: { Cmd: null } }, recordingSink());
    expect(record.command).toBe("null");
    expect(record.environmentVar).toBeUndefined();
  });

  it("sets composeGroup when Labels holds the compose project key", () => {
    const record: InventoryRecord = {};
    mapConfig(record, { Config: { Labels: { "com.docker.compose.project": "myapp" } } }, recordingSink());
    expect(record.composeGroup).toBe("myapp");
  });

  it("leaves composeGroup absent when Labels is missing", () => {
    const record: InventoryRecord = {};
    mapConfig(record, { Config: { Hostname: "h" } }, recordingSink());
    expect(record).not.toHaveProperty("composeGroup");
  });

  it("leaves composeGroup absent when Labels lacks the project key", () => {
    const record: InventoryRecord = {};
    mapConfig(record, { Config: { Labels: { "com.docker.compose.service": "web" } } }, recordingSink());
    expect(record).not.toHaveProperty("composeGroup");
  });

  it("leaves composeGroup absent when the project label is not a string", () => {
    const record: InventoryRecord = {};
    mapConfig(record, { Config: { Labels: { "com.docker.compose.project": 5 } } }, recordingSink());
    expect(record).not.toHaveProperty("composeGroup");
  });

  it("leaves containerHostname absent when Hostname is not a string", () => {
    const record: InventoryRecord = {};
    mapConfig(record, { Config: { Hostname: null, Env: [] } }, recordingSink());
    expect(record).toEqual({ environmentVar: "[]" });
  });

  it("leaves composeGroup absent when Labels is null", () => {
    const record: InventoryRecord = {};
    mapConfig(record, { Config: { Labels: null } }, recordingSink());
    expect(record).not.toHaveProperty("composeGroup");
  });

  it("warns with the root Id when Config is missing", () => {
    const record: InventoryRecord = {};
    const sink = recordingSink();
    mapConfig(record, { Id: "abc" }, sink);

    expect(record).toEqual({});
    expect(sink.events).toEqual([
      { severity: "warning", message: "Container abc has no Config block", containerId: "abc", operation: "config" },
    ]);
  });

  it("warns with a null id when neither Config nor Id exist", () => {
    const sink = recordingSink();
    mapConfig({}, {}, sink);
    expect(sink.events[0]?.containerId).toBeNull();
    expect(sink.events[0]?.message).toBe("Container <unknown> has no Config block");
  });

  it("treats a non-object Config as missing", () => {
    const sink = recordingSink();
    mapConfig({}, { Id: "abc", Config: ["not", "an", "object"] }, sink);
    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]?.operation).toBe("config");
  });
});

// ---------------------------------------------------------------------------
// State block
// ---------------------------------------------------------------------------

describe("mapState", () => {
  it("sets exit code and state from the State block", () => {
    const record: InventoryRecord = {};
    mapState(record, { State: { ExitCode: 0, Running: true, Paused: false } }, recordingSink());
    expect(record.exitCode).toBe(0);
    expect(record.state).toBe("Running");
  });

  it("reports Failed with the engine exit code", () => {
    const record: InventoryRecord = {};
    mapState(record, { State: { ExitCode: 2, Running: false } }, recordingSink());
    expect(record).toEqual({ exitCode: 2, state: "Failed" });
  });

  it("truncates a fractional exit code", () => {
    const failed: InventoryRecord = {};
    mapState(failed, { State: { ExitCode: 2.9, Running: true } }, recordingSink());
    expect(failed).toEqual({ exitCode: 2, state: "Failed" });

    const running: InventoryRecord = {};
    mapState(running, { State: { ExitCode: 0.4, Running: true } }, recordingSink());
    expect(running).toEqual({ exitCode: 0, state: "Running" });

    const stopped: InventoryRecord = {};
    mapState(stopped, { State: { ExitCode: 0.4 } }, recordingSink());
    expect(stopped).toEqual({ exitCode: 0, state: "Stopped" });
  });

  it("falls back to exit code 0 when ExitCode is not a number", () => {
    const record: InventoryRecord = {};
    mapState(record, { State: { ExitCode: "oops", Paused: true } }, recordingSink());
    expect(record).toEqual({ exitCode: 0, state: "Paused" });
  });

  it("leaves state unset and warns when State is missing", () => {
    const record: InventoryRecord = {};
    const sink = recordingSink();
    expect(() => mapState(record, { Id: "x1" }, sink)).not.toThrow();
    expect(record.state).toBeUndefined();
    expect(record.exitCode).toBeUndefined();
    expect(sink.events).toEqual([
      { severity: "warning", message: "Container x1 has no State block", containerId: "x1", operation: "state" },
    ]);
  });

  it("does not copy timestamps by default", () => {
    const record: InventoryRecord = {};
    mapState(
      record,
      { State: { ExitCode: 0, StartedAt: "2024-01-01T00:00:00Z", FinishedAt: "0001-01-01T00:00:00Z" } },
      recordingSink(),
    );
    expect(record).toEqual({ exitCode: 0, state: "Stopped" });
  });

  it("copies timestamps when captureStateTimestamps is enabled", () => {
    const record: InventoryRecord = {};
    mapState(
      record,
      { State: { ExitCode: 0, Running: true, StartedAt: "2024-01-01T00:00:00Z", FinishedAt: "0001-01-01T00:00:00Z" } },
      recordingSink(),
      { captureStateTimestamps: true },
    );
    expect(record.startedAt).toBe("2024-01-01T00:00:00Z");
    expect(record.finishedAt).toBe("0001-01-01T00:00:00Z");
  });
});

// ---------------------------------------------------------------------------
// HostConfig block
// ---------------------------------------------------------------------------

describe("mapHostConfig", () => {
  it("serializes Links and PortBindings", () => {
    const record: InventoryRecord = {};
    mapHostConfig(
      record,
      {
        HostConfig: {
          Links: ["/db:/web/db"],
          PortBindings: { "80/tcp": [{ HostIp: "", HostPort: "8080" }] },
        },
      },
      recordingSink(),
    );
    expect(record.links).toBe('["/db:/web/db"]');
    expect(record.ports).toBe('{"80/tcp":[{"HostIp":"","HostPort":"8080"}]}');
  });

  it("serializes empty structures", () => {
    const record: InventoryRecord = {};
    mapHostConfig(record, { HostConfig: { Links: [], PortBindings: {} } }, recordingSink());
    expect(record).toEqual({ links: "[]", ports: "{}" });
  });

  it("warns when HostConfig is missing", () => {
    const sink = recordingSink();
    mapHostConfig({}, { Id: "h1" }, sink);
    expect(sink.events).toEqual([
      {
        severity: "warning",
        message: "Container h1 has no HostConfig block",
        containerId: "h1",
        operation: "hostConfig",
      },
    ]);
  });
});

describe("serializeValue", () => {
  it("returns undefined for a missing key", () => {
    expect(serializeValue({}, "Env")).toBeUndefined();
  });
});
