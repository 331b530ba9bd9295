import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "node:events";

// Mock child_process so no vtysh is needed
vi.mock("node:child_process", () => ({
  spawn: vi.fn(),
}));

import { spawn } from "node:child_process";
import { ConfigLoadError } from "../errors.js";
import { runVtysh, stripBanner, Vtysh } from "./vtysh.js";

interface FakeRun {
  stdout?: string;
  stderr?: string;
  code?: number;
  error?: NodeJS.ErrnoException;
  stdinError?: Error;
}

function fakeProcess(run: FakeRun) {
  const proc = Object.assign(new EventEmitter(), {
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
    stdin: Object.assign(new EventEmitter(), { write: vi.fn(), end: vi.fn() }),
  });

  setImmediate(() => {
    if (run.stdinError) proc.stdin.emit("error", run.stdinError);
    if (run.error) {
      proc.emit("error", run.error);
      return;
    }
    if (run.stdout) proc.stdout.emit("data", Buffer.from(run.stdout));
    if (run.stderr) proc.stderr.emit("data", Buffer.from(run.stderr));
    proc.emit("close", run.code ?? 0);
  });

  return proc;
}

const spawned: ReturnType<typeof fakeProcess>[] = [];

// Each spawn call consumes the next run
function mockRuns(...runs: FakeRun[]) {
  const queue = [...runs];
  vi.mocked(spawn).mockImplementation(() => {
    const proc = fakeProcess(queue.shift() ?? {});
    spawned.push(proc);
    return proc as unknown as ReturnType<typeof spawn>;
  });
}

beforeEach(() => {
  vi.mocked(spawn).mockReset();
  spawned.length = 0;
});

describe("runVtysh", () => {
  it("collects stdout of a successful run", async () => {
    mockRuns({ stdout: "hostname r1\n" });

    const result = await runVtysh("vtysh", ["-c", "show running-config"]);

    expect(spawn).toHaveBeenCalledWith("vtysh", ["-c", "show running-config"]);
    expect(result).toEqual({ ok: true, exitCode: 0, stdout: "hostname r1\n", stderr: "" });
  });

  it("reports a rejected command as a result, not an exception", async () => {
    mockRuns({ stderr: "% Unknown command.\n", code: 1 });

    const result = await runVtysh("vtysh", ["-c", "conf t", "-c", "no bogus"]);

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("% Unknown command.\n");
  });

  it("rejects when vtysh is not installed", async () => {
    const error: NodeJS.ErrnoException = new Error("spawn vtysh ENOENT");
    error.code = "ENOENT";
    mockRuns({ error });

    await expect(runVtysh("vtysh", [])).rejects.toThrow("vtysh not found in PATH");
  });

  it("feeds input on stdin", async () => {
    mockRuns({});

    await runVtysh("vtysh", ["-m", "-f", "-"], "router ospf\n");

    expect(spawned[0].stdin.write).toHaveBeenCalledWith("router ospf\n");
    expect(spawned[0].stdin.end).toHaveBeenCalled();
  });
  it("reports a closed stdin as a failed run", async () => {
    const stdinError: NodeJS.ErrnoException = new Error("write EPIPE");
    stdinError.code = "EPIPE";
    mockRuns({ stdinError, code: 0 });

    const result = await runVtysh("vtysh", ["-m", "-f", "-"], "router ospf\n");

    expect(result).toEqual({ ok: false, exitCode: 0, stdout: "", stderr: "stdin: write EPIPE\n" });
  });
});

describe("stripBanner", () => {
  it("drops the leading lines", () => {
    expect(stripBanner("a\nb\nc\nd\ne", 3)).toBe("d\ne");
  });
});

describe("Vtysh", () => {
  it("marks a config file", async () => {
    mockRuns({ stdout: "router ospf\nend\n" });

    const text = await new Vtysh().markFile("/etc/quagga/Quagga.conf");

    expect(spawn).toHaveBeenCalledWith("vtysh", ["-m", "-f", "/etc/quagga/Quagga.conf"]);
    expect(text).toBe("router ospf\nend\n");
  });

  it("fails to load when marking fails", async () => {
    mockRuns({ code: 1, stderr: "line 3: % Unknown command" });

    await expect(new Vtysh().markFile("/tmp/broken.conf")).rejects.toBeInstanceOf(ConfigLoadError);
  });

  it("strips the banner of show running-config before marking it", async () => {
    mockRuns(
      { stdout: "Building configuration...\n\nCurrent configuration:\nhostname r1\n!\nend\n" },
      { stdout: "hostname r1\nend\n" }
    );

    const text = await new Vtysh().showRunning();

    expect(vi.mocked(spawn).mock.calls[1]).toEqual(["vtysh", ["-m", "-f", "-"]]);
    expect(spawned[1].stdin.write).toHaveBeenCalledWith("hostname r1\n!\nend\n");
    expect(text).toBe("hostname r1\nend\n");
  });

  it("honors a custom banner length", async () => {
    mockRuns({ stdout: "banner\nhostname r1\n" }, { stdout: "hostname r1\n" });

    await new Vtysh({ bannerLines: 1 }).showRunning();

    expect(spawned[1].stdin.write).toHaveBeenCalledWith("hostname r1\n");
  });

  it("does not mark when show running-config fails", async () => {
    mockRuns({ code: 1 });

    await expect(new Vtysh().showRunning()).rejects.toBeInstanceOf(ConfigLoadError);
    expect(spawn).toHaveBeenCalledTimes(1);
  });

  it("fails to load when marking exits before reading the running config", async () => {
    mockRuns({ stdout: "a\nb\nc\nhostname r1\n" }, { stdinError: new Error("write EPIPE"), code: 1 });

    await expect(new Vtysh().showRunning()).rejects.toBeInstanceOf(ConfigLoadError);
  });

  it("executes directives with a custom program", async () => {
    mockRuns({});

    const cli = new Vtysh({ command: "/usr/local/bin/vtysh" });
    const result = await cli.execute(["conf t", "router ospf"]);

    expect(cli.program).toBe("/usr/local/bin/vtysh");
    expect(spawn).toHaveBeenCalledWith("/usr/local/bin/vtysh", ["-c", "conf t", "-c", "router ospf"]);
    expect(result.ok).toBe(true);
  });
});
