import { Readable, Writable } from "node:stream";
import { finished } from "node:stream/promises";
import type Docker from "dockerode";
import type { LogSource, LogWindow } from "./types.js";

/**
 * Output of the reverse proxy container.
 */
export class DockerLogSource implements LogSource {
  private readonly docker: Docker;
  private readonly container: string;

  constructor(docker: Docker, container: string) {
    this.docker = docker;
    this.container = container;
  }

  async fetchRecent(window: LogWindow): Promise<string> {
    const container = this.docker.getContainer(this.container);
    const info = await container.inspect();
    const since = Math.floor(Date.now() / 1000) - window.sinceSeconds;
    const logs = await container.logs({
      stdout: true,
      stderr: true,
      tail: window.tail,
      since,
      follow: false,
    });

    // Without a TTY every chunk carries an 8-byte stream header.
    if (info.Config.Tty) return logs.toString("utf-8");
    return this.demux(logs);
  }

  /** Strip stream headers, keeping stdout and stderr interleaved. */
  private async demux(framed: Buffer): Promise<string> {
    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });
    const source = Readable.from([framed]);

    this.docker.modem.demuxStream(source, sink, sink);
    await finished(source);
    sink.end();
    await finished(sink);
    return Buffer.concat(chunks).toString("utf-8");
  }
}
