import fs from "node:fs";
import path from "node:path";
import { spawn } from "node:child_process";
import {
  FixtureStateError,
  PollTimeoutError,
  StartupError,
  StartupTimeoutError,
  TeardownError,
  errorMessage
} from "../core/errors.js";
import { NOT_YET, failure, poll, success, type Clock } from "../core/retry.js";
import { parseVersion, type Version } from "../core/version.js";
import { QueryClient } from "../query/client.js";
import { SERVER_JAR, type Installer } from "./installer.js";
import { findFreePorts } from "./ports.js";
import { nextFixtureState, type FixtureEvent, type FixtureState } from "./state-machine.js";

/** Read-only view of a running instance, handed to every scenario. */
export interface FixtureHandle {
  readonly version: Version;
  readonly host: string;
  readonly ilpPort: number;
  readonly httpUrl: string;
}

/** What the orchestrator needs to drive one instance's lifecycle. */
export interface TestFixture extends FixtureHandle {
  readonly state: FixtureState;
  install(): Promise<void>;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** The subset of ChildProcess the fixture relies on. */
export interface ServerProcess {
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
}

export type LaunchSpec = {
  command: string;
  args: string[];
  cwd: string;
  logFd: number;
};

export type Launcher = (spec: LaunchSpec) => ServerProcess;
export type HealthProbe = (httpUrl: string) => Promise<boolean>;
export type PortAllocator = (count: number) => Promise<number[]>;

export type FixturePorts = {
  http: number;
  ilp: number;
  pg: number;
};

export type DatabaseFixtureOptions = {
  version: string;
  artifactUrl: string;
  installer: Installer;
  startTimeoutMs: number;
  stopTimeoutMs: number;
  host?: string;
  java?: string;
  pollIntervalMs?: number;
  clock?: Clock;
  launcher?: Launcher;
  healthProbe?: HealthProbe;
  allocatePorts?: PortAllocator;
};

const INSTALL_DIR_RE = /^questdb-(.+?)(?:-no-jre-bin|-rt-[\w-]+|-bin)?$/;

/** Derive the server version from an unpacked install directory name. */
export function versionFromInstallPath(installPath: string): Version {
  const name = path.basename(installPath);
  const m = INSTALL_DIR_RE.exec(name);
  return parseVersion(m ? m[1] : name);
}

export function renderServerConf(ports: FixturePorts): string {
  return [
    `http.bind.to=0.0.0.0:${ports.http}`,
    `line.tcp.net.bind.to=0.0.0.0:${ports.ilp}`,
    `pg.net.bind.to=0.0.0.0:${ports.pg}`,
    "http.min.enabled=false",
    "line.udp.enabled=false",
    ""
  ].join("\n");
}

export function buildLaunchArgs(jarPath: string, dataDir: string): string[] {
  return [
    "-DQuestDB-Runtime-0",
    "-ea",
    "-Dnoebug",
    "-XX:+UnlockExperimentalVMOptions",
    "-XX:+AlwaysPreTouch",
    "-XX:+UseParallelGC",
    "-p",
    jarPath,
    "-m",
    "io.questdb/io.questdb.ServerMain",
    "-d",
    dataDir
  ];
}

/** Configured binary, else `$JAVA_HOME/bin/java`, else `java` from PATH. */
export function resolveJava(configured?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (configured) return configured;
  if (env.JAVA_HOME) return path.join(env.JAVA_HOME, "bin", "java");
  return "java";
}

const spawnLauncher: Launcher = (spec) =>
  spawn(spec.command, spec.args, {
    cwd: spec.cwd,
    stdio: ["ignore", spec.logFd, spec.logFd]
  });

const httpHealthProbe: HealthProbe = (httpUrl) => new QueryClient(httpUrl, { requestTimeoutMs: 1000 }).ping();

type ExitInfo = { code: number | null; signal: NodeJS.Signals | null; error?: Error };

/**
 * One installed database instance: install, start, health-wait, stop.
 *
 * `stop()` is safe from every state, including a half-finished `start()`,
 * so callers can always release the fixture in a `finally` block.
 */
export class DatabaseFixture implements TestFixture {
  private _state: FixtureState = "uninstalled";
  private installPath: string | null = null;
  private _version: Version | null = null;
  private ports: FixturePorts | null = null;
  private proc: ServerProcess | null = null;
  private exitInfo: ExitInfo | null = null;
  private exited: Promise<void> = Promise.resolve();
  private logFd: number | null = null;

  readonly host: string;
  private readonly opts: DatabaseFixtureOptions;

  constructor(opts: DatabaseFixtureOptions) {
    this.opts = opts;
    this.host = opts.host ?? "localhost";
  }

  get state(): FixtureState {
    return this._state;
  }

  /** Version parsed from the installed artifact, available after install(). */
  get version(): Version {
    if (!this._version) throw new FixtureStateError("Fixture version is unknown before install()");
    return this._version;
  }

  get ilpPort(): number {
    return this.requirePorts().ilp;
  }

  get ilpAddress(): { host: string; port: number } {
    return { host: this.host, port: this.ilpPort };
  }

  get httpPort(): number {
    return this.requirePorts().http;
  }

  get httpUrl(): string {
    return `http://${this.host}:${this.requirePorts().http}`;
  }

  get dataDir(): string {
    return path.join(this.requireInstallPath(), "data");
  }

  get logPath(): string {
    return path.join(this.dataDir, "log", "stdout.txt");
  }

  async install(): Promise<void> {
    this.assertCan("install");
    const installPath = await this.opts.installer.install(this.opts.version, this.opts.artifactUrl);
    this._version = versionFromInstallPath(installPath);
    this.installPath = installPath;
    this.transition("install");
  }

  async start(): Promise<void> {
    this.assertCan("start");
    this.transition("start");

    const [http, ilp, pg] = await (this.opts.allocatePorts ?? findFreePorts)(3);
    this.ports = { http, ilp, pg };

    const confDir = path.join(this.dataDir, "conf");
    fs.mkdirSync(confDir, { recursive: true });
    fs.writeFileSync(path.join(confDir, "server.conf"), renderServerConf(this.ports), "utf8");
    fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    this.logFd = fs.openSync(this.logPath, "a");

    this.launch({
      command: resolveJava(this.opts.java),
      args: buildLaunchArgs(path.join(this.requireInstallPath(), SERVER_JAR), this.dataDir),
      cwd: this.dataDir,
      logFd: this.logFd
    });

    const probeHealth = this.opts.healthProbe ?? httpHealthProbe;
    const httpUrl = this.httpUrl;

    try {
      await poll<boolean>(
        async () => {
          if (this.exitInfo) return failure(new StartupError(this.describeExit()));
          return (await probeHealth(httpUrl)) ? success(true) : NOT_YET;
        },
        {
          timeoutMs: this.opts.startTimeoutMs,
          intervalMs: this.opts.pollIntervalMs,
          clock: this.opts.clock,
          message: `Server at ${httpUrl} did not become healthy`
        }
      );
    } catch (e) {
      if (e instanceof PollTimeoutError) {
        throw new StartupTimeoutError(`${e.message}; see ${this.logPath}`);
      }
      throw e;
    }

    this.transition("ready");
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    try {
      if (proc && !this.exitInfo) {
        proc.kill("SIGTERM");
        if (!(await this.waitForExit(this.opts.stopTimeoutMs))) {
          proc.kill("SIGKILL");
          if (!(await this.waitForExit(this.opts.stopTimeoutMs))) {
            throw new TeardownError("Server process did not exit after SIGKILL");
          }
        }
      }
    } finally {
      this.proc = null;
      if (this.logFd !== null) {
        fs.closeSync(this.logFd);
        this.logFd = null;
      }
      this._state = nextFixtureState(this._state, "stop");
    }
  }

  private launch(spec: LaunchSpec): void {
    let proc: ServerProcess;
    try {
      proc = (this.opts.launcher ?? spawnLauncher)(spec);
    } catch (e) {
      throw new StartupError(`Failed to launch ${spec.command}: ${errorMessage(e)}`, { cause: e });
    }
    this.proc = proc;
    this.exited = new Promise<void>((resolve) => {
      proc.once("exit", (code, signal) => {
        this.exitInfo = { code, signal };
        resolve();
      });
      proc.once("error", (err) => {
        this.exitInfo = { code: null, signal: null, error: err };
        resolve();
      });
    });
  }

  private async waitForExit(ms: number): Promise<boolean> {
    if (this.exitInfo) return true;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    try {
      return await Promise.race([this.exited.then(() => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private describeExit(): string {
    const info = this.exitInfo;
    if (info?.error) return `Failed to launch server: ${info.error.message}`;
    return `Server died during startup (code=${info?.code ?? "null"}, signal=${info?.signal ?? "null"}); see ${this.logPath}`;
  }

  private requireInstallPath(): string {
    if (!this.installPath) throw new FixtureStateError("Fixture is not installed");
    return this.installPath;
  }

  private requirePorts(): FixturePorts {
    if (!this.ports) throw new FixtureStateError("Fixture ports are unknown before start()");
    return this.ports;
  }

  private assertCan(event: FixtureEvent): void {
    nextFixtureState(this._state, event);
  }

  private transition(event: FixtureEvent): void {
    this._state = nextFixtureState(this._state, event);
  }
}
