import fs from "node:fs";
import { mkdir, readdir, rm } from "node:fs/promises";
import path from "node:path";
import { execFile } from "node:child_process";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { promisify } from "node:util";
import { InstallError, errorMessage } from "../core/errors.js";
import type { FetchFn } from "../query/client.js";

const pExecFile = promisify(execFile);

export const SERVER_JAR = "questdb.jar";

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 10 * 60 * 1000;

/** Given a version and where to get it, return a runnable install directory. */
export interface Installer {
  install(version: string, artifactUrl: string): Promise<string>;
}

export type DownloadFn = (url: string, destFile: string) => Promise<void>;
export type ExtractFn = (archive: string, destDir: string) => Promise<void>;

export type TarballInstallerOptions = {
  fetch?: FetchFn;
  downloadTimeoutMs?: number;
  download?: DownloadFn;
  extract?: ExtractFn;
};

/**
 * Downloads a release tarball into `{installRoot}/{version}/` and unpacks it.
 * A version that is already unpacked is returned as-is.
 */
export class TarballInstaller implements Installer {
  private readonly download: DownloadFn;
  private readonly extract: ExtractFn;

  constructor(
    private readonly installRoot: string,
    opts: TarballInstallerOptions = {}
  ) {
    this.download = opts.download ?? httpDownload(opts.fetch ?? fetch, opts.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS);
    this.extract = opts.extract ?? tarExtract;
  }

  async install(version: string, artifactUrl: string): Promise<string> {
    const versionDir = path.resolve(this.installRoot, version);
    const existing = await findServerDir(versionDir);
    if (existing) return existing;

    await rm(versionDir, { recursive: true, force: true });
    await mkdir(versionDir, { recursive: true });

    const archive = path.join(versionDir, path.basename(new URL(artifactUrl).pathname) || "questdb.tar.gz");
    try {
      await this.download(artifactUrl, archive);
      await this.extract(archive, versionDir);
    } catch (e) {
      await rm(versionDir, { recursive: true, force: true });
      throw new InstallError(`Failed to install ${version} from ${artifactUrl}: ${errorMessage(e)}`, { cause: e });
    } finally {
      await rm(archive, { force: true });
    }

    const serverDir = await findServerDir(versionDir);
    if (!serverDir) {
      throw new InstallError(`No ${SERVER_JAR} found after unpacking ${artifactUrl} into ${versionDir}`);
    }
    return serverDir;
  }
}

/**
 * Locate the unpacked `questdb-<version>-no-jre-bin` directory (the one
 * holding the server jar) inside a version directory.
 */
export async function findServerDir(versionDir: string): Promise<string | null> {
  if (!fs.existsSync(versionDir)) return null;
  const entries = await readdir(versionDir, { withFileTypes: true });
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isDirectory()) continue;
    const candidate = path.join(versionDir, entry.name);
    if (fs.existsSync(path.join(candidate, SERVER_JAR))) return candidate;
  }
  return null;
}

function httpDownload(fetchFn: FetchFn, timeoutMs: number): DownloadFn {
  return async (url, destFile) => {
    const res = await fetchFn(url, { redirect: "follow", signal: AbortSignal.timeout(timeoutMs) });
    if (res.status !== 200 || !res.body) {
      throw new Error(`Download of ${url} failed with status ${res.status}`);
    }
    await pipeline(Readable.fromWeb(res.body), fs.createWriteStream(destFile));
  };
}

async function tarExtract(archive: string, destDir: string): Promise<void> {
  await pExecFile("tar", ["-xzf", archive, "-C", destDir], { maxBuffer: 10 * 1024 * 1024 });
}
