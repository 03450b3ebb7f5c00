import { Chalk, type ChalkInstance } from "chalk";
import type { ProgressEvent } from "../images/progress.js";
import type {
  AppListing,
  InstallResult,
  RemoveResult,
  RunResult,
  StatusEntry,
  StopResult,
} from "../lab/lab-manager.js";
import { effectiveImage } from "../manifest/app.js";
import type { FetchedManifest } from "../manifest/manifest-source.js";
import type { AcceptedManifest } from "../manifest/trust-store.js";
import type { PortConfig } from "../manifest/types.js";

/** Where rendered lines go. */
export interface OutputWriter {
  out(line: string): void;
  err(line: string): void;
}

export const consoleWriter: OutputWriter = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

function portLabel(p: PortConfig): string {
  return p.protocol === "http" ? String(p.port) : `${p.port}/${p.protocol}`;
}

function shortId(id: string): string {
  return id.slice(0, 12);
}

/**
 * User-facing rendering. Human mode prints prefixed status lines; JSON mode
 * prints only the final result document and drops progress.
 */
export class Output {
  readonly json: boolean;
  private readonly writer: OutputWriter;
  private readonly c: ChalkInstance;

  constructor(json: boolean, writer: OutputWriter = consoleWriter, color = process.stdout.isTTY === true) {
    this.json = json;
    this.writer = writer;
    this.c = new Chalk({ level: color ? 1 : 0 });
  }

  info(message: string): void {
    if (!this.json) this.writer.out(`${this.c.blue("[*]")} ${message}`);
  }

  success(message: string): void {
    if (!this.json) this.writer.out(`${this.c.green("[+]")} ${message}`);
  }

  warning(message: string): void {
    if (!this.json) this.writer.out(`${this.c.yellow("[!]")} ${message}`);
  }

  /** Report a failed command. Goes to stderr in both modes. */
  failure(err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    if (this.json) {
      this.writer.err(JSON.stringify({ error: message }, null, 2));
    } else {
      this.writer.err(`${this.c.red("[-]")} ${message}`);
    }
  }

  progress(event: ProgressEvent): void {
    if (this.json) return;
    if (event.phase === "pull" || event.phase === "build") {
      this.writer.out(this.c.dim(`    ${event.message}`));
    } else {
      this.info(event.message);
    }
  }

  /** Progress callback bound to this sink. */
  get onProgress(): (event: ProgressEvent) => void {
    return (event) => this.progress(event);
  }

  private document(data: unknown): void {
    this.writer.out(JSON.stringify(data, null, 2));
  }

  installed(result: InstallResult): void {
    if (this.json) {
      this.document({ status: "installed", app: result.app, image: result.image, gitCommit: result.gitCommit });
      return;
    }
    const commit = result.gitCommit ? ` at ${shortId(result.gitCommit)}` : "";
    this.success(`Installed ${this.c.bold(result.app)} (${result.image})${commit}`);
  }

  rebuilt(result: InstallResult): void {
    if (this.json) {
      this.document({ status: "rebuilt", app: result.app, image: result.image, gitCommit: result.gitCommit });
      return;
    }
    this.success(`Rebuilt ${this.c.bold(result.app)} (${result.image})`);
  }

  running(result: RunResult): void {
    if (this.json) {
      this.document({
        status: "running",
        app: result.app,
        hostnames: result.hostnames,
        ports: result.ports,
        domain: result.domain,
        https: result.https,
      });
      return;
    }
    this.success(`Started ${this.c.bold(result.app)}`);
    const scheme = result.https ? "https" : "http";
    for (const hostname of result.hostnames) {
      this.writer.out(`  ${this.c.green("->")} ${this.c.cyan(`${scheme}://${hostname}`)}`);
    }
    for (const p of result.ports) {
      const label = p.label ? ` (${p.label})` : "";
      this.writer.out(`  ${this.c.green("->")} ${p.protocol} localhost:${p.hostPort} -> ${p.containerPort}${label}`);
    }
  }

  stopped(result: StopResult): void {
    if (this.json) {
      this.document({ status: "stopped", app: result.app });
      return;
    }
    if (!result.wasRunning) {
      this.info(`Container for ${result.app} had already stopped`);
    }
    this.success(`Stopped ${this.c.bold(result.app)}`);
  }

  removed(result: RemoveResult): void {
    if (this.json) {
      this.document({ status: "removed", app: result.app });
      return;
    }
    if (result.purgeSkipped) {
      this.warning("Image removal not implemented yet with --purge");
    }
    if (result.proxyStopped) {
      this.info("No more apps running, stopped Traefik");
    }
    this.success(`Removed ${this.c.bold(result.app)}`);
  }

  apps(listings: AppListing[], title = "Available Vulnerable Applications"): void {
    if (this.json) {
      this.document(
        listings.map(({ app, installed, running }) => ({
          name: app.name,
          version: app.version,
          type: app.type,
          image: effectiveImage(app),
          description: app.description,
          tags: app.tags,
          ports: app.ports,
          installed,
          running,
        })),
      );
      return;
    }
    this.writer.out(this.c.bold.underline(title));
    for (const { app, installed, running } of listings) {
      const badge = running
        ? this.c.green.bold("[RUNNING]")
        : installed
          ? this.c.blue("[INSTALLED]")
          : this.c.dim("[AVAILABLE]");
      this.writer.out(`  ${this.c.bold(app.name)} ${this.c.dim(`v${app.version}`)} ${badge}`);
      if (app.description) this.writer.out(`    ${app.description}`);
      this.writer.out(`    Image: ${this.c.cyan(effectiveImage(app))}`);
      if (app.ports.length > 0) this.writer.out(`    Ports: ${app.ports.map(portLabel).join(", ")}`);
      if (app.tags.length > 0) this.writer.out(`    Tags:  ${app.tags.join(", ")}`);
    }
  }

  searchResults(query: string, listings: AppListing[]): void {
    if (!this.json && listings.length === 0) {
      this.warning(`No applications match '${query}'`);
      return;
    }
    this.apps(listings, `Applications matching '${query}'`);
  }

  status(entries: StatusEntry[]): void {
    if (this.json) {
      this.document(
        entries.map((e) => ({
          name: e.app,
          running: e.running,
          containerId: e.containerId,
          hostnames: e.hostnames,
          ports: e.ports,
        })),
      );
      return;
    }
    if (entries.length === 0) {
      this.writer.out("No vuln-pkg applications are currently managed.");
      return;
    }
    this.writer.out(this.c.bold.underline("Application Status"));
    for (const e of entries) {
      const state = e.running ? this.c.green.bold("RUNNING") : this.c.red("STOPPED");
      this.writer.out(`  ${this.c.bold(e.app)} [${state}]`);
      if (e.containerId) this.writer.out(`    Container: ${shortId(e.containerId)}`);
      for (const hostname of e.hostnames) this.writer.out(`    URL: ${this.c.cyan(`http://${hostname}`)}`);
      for (const p of e.ports) this.writer.out(`    Port: ${p.protocol} localhost:${p.hostPort} -> ${p.containerPort}`);
    }
  }

  /** Publisher details and app count, shown before asking for trust. */
  manifestInfo(fetched: FetchedManifest): void {
    if (this.json) return;
    const { meta, apps } = fetched.manifest;
    this.writer.out(this.c.bold.underline("Manifest"));
    this.writer.out(`    URL:         ${fetched.url}`);
    if (meta.author) this.writer.out(`    Author:      ${meta.author}`);
    if (meta.email) this.writer.out(`    Email:       ${meta.email}`);
    if (meta.url) this.writer.out(`    Homepage:    ${meta.url}`);
    if (meta.description) this.writer.out(`    Description: ${meta.description}`);
    this.writer.out(`    Apps:        ${apps.length}`);
  }

  manifestShown(fetched: FetchedManifest, accepted: boolean): void {
    if (this.json) {
      this.document({ url: fetched.url, accepted, meta: fetched.manifest.meta, apps: fetched.manifest.apps });
      return;
    }
    this.manifestInfo(fetched);
    this.manifestYaml(fetched.text);
    if (accepted) {
      this.success("This manifest has been previously accepted");
    } else {
      this.warning("This manifest has NOT been accepted yet");
    }
  }

  manifestYaml(text: string): void {
    if (this.json) return;
    this.writer.out(this.c.dim("---"));
    for (const line of text.trimEnd().split("\n")) this.writer.out(line);
    this.writer.out(this.c.dim("---"));
  }

  acceptedManifests(accepted: Record<string, AcceptedManifest>): void {
    if (this.json) {
      this.document(accepted);
      return;
    }
    const urls = Object.keys(accepted).sort();
    if (urls.length === 0) {
      this.writer.out("No manifests have been accepted.");
      return;
    }
    this.writer.out(this.c.bold.underline("Accepted Manifests"));
    for (const url of urls) {
      const entry = accepted[url];
      this.writer.out(`  ${this.c.bold(url)}`);
      this.writer.out(`    Accepted: ${entry.acceptedAt}`);
      if (entry.author) this.writer.out(`    Author:   ${entry.author}`);
    }
  }

  manifestForgotten(url: string, forgotten: boolean): void {
    if (this.json) {
      this.document({ status: forgotten ? "forgotten" : "not_accepted", url });
      return;
    }
    if (forgotten) {
      this.success(`Forgot manifest ${url}`);
    } else {
      this.warning(`Manifest ${url} was not accepted`);
    }
  }
}
