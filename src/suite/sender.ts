import { Sender } from "@questdb/nodejs-client";
import type { FixtureHandle } from "../fixture/fixture.js";

/**
 * Row builder of the ILP client, as the scenarios use it. Each row is
 * `table`, then symbols, then columns, then `at`/`atNow`.
 */
export interface LineSender {
  table(name: string): LineSender;
  symbol(name: string, value: string): LineSender;
  stringColumn(name: string, value: string): LineSender;
  booleanColumn(name: string, value: boolean): LineSender;
  intColumn(name: string, value: number): LineSender;
  floatColumn(name: string, value: number): LineSender;
  /** Close the row with an explicit designated timestamp in nanoseconds. */
  at(timestampNs: bigint): Promise<void>;
  atNow(): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export type SenderFactory = (fixture: FixtureHandle) => Promise<LineSender>;

/** LineSender over `@questdb/nodejs-client`, speaking ILP over TCP. */
export class IlpTcpSender implements LineSender {
  private constructor(private readonly sender: Sender) {}

  static async connect(host: string, port: number): Promise<IlpTcpSender> {
    const sender = await Sender.fromConfig(`tcp::addr=${host}:${port}`);
    await sender.connect();
    return new IlpTcpSender(sender);
  }

  table(name: string): LineSender {
    this.sender.table(name);
    return this;
  }

  symbol(name: string, value: string): LineSender {
    this.sender.symbol(name, value);
    return this;
  }

  stringColumn(name: string, value: string): LineSender {
    this.sender.stringColumn(name, value);
    return this;
  }

  booleanColumn(name: string, value: boolean): LineSender {
    this.sender.booleanColumn(name, value);
    return this;
  }

  intColumn(name: string, value: number): LineSender {
    this.sender.intColumn(name, value);
    return this;
  }

  floatColumn(name: string, value: number): LineSender {
    this.sender.floatColumn(name, value);
    return this;
  }

  async at(timestampNs: bigint): Promise<void> {
    await this.sender.at(timestampNs, "ns");
  }

  async atNow(): Promise<void> {
    await this.sender.atNow();
  }

  async flush(): Promise<void> {
    await this.sender.flush();
  }

  async close(): Promise<void> {
    await this.sender.close();
  }
}

export const openIlpSender: SenderFactory = (fixture) => IlpTcpSender.connect(fixture.host, fixture.ilpPort);
