import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { logger, setLogLevel } from "../config/logger.js";
import { drain } from "../images/progress.js";
import { requireApp } from "../lab/lab-manager.js";
import type { TrustPrompt } from "../manifest/manifest-source.js";
import type { Manifest } from "../manifest/types.js";
import { Output, type OutputWriter } from "../output/output.js";
import type { RoutingOptions } from "../proxy/types.js";
import type { CliServices } from "./services.js";
import { terminalTrustPrompt } from "./trust-prompt.js";

const ipv4Schema = z.string().ip({ version: "v4" });

export function parseIPv4(value: string): string {
  if (!ipv4Schema.safeParse(value).success) {
    throw new InvalidArgumentError("Not a valid IPv4 address.");
  }
  return value;
}

export interface GlobalOptions {
  json: boolean;
  manifestUrl: string;
  resolveAddress: string;
  domain?: string;
  https: boolean;
  yes: boolean;
  verbose: boolean;
}

/** Base domain for hostnames: explicit `--domain`, else `<address>.sslip.io`. */
export function routingFor(opts: GlobalOptions): RoutingOptions {
  return { domain: opts.domain ?? `${opts.resolveAddress}.sslip.io`, https: opts.https };
}

export interface ProgramDeps {
  services: CliServices;
  manifestUrl: string;
  writer?: OutputWriter;
  color?: boolean;
  /** Overrides the terminal prompt used for unaccepted manifests. */
  prompt?: (output: Output) => TrustPrompt;
}

interface CommandContext {
  opts: GlobalOptions;
  output: Output;
  loadManifest(): Promise<Manifest>;
}

/**
 * The `vuln-pkg` command tree. Every command reconciles recorded state with
 * the daemon first; a failing command prints its error and sets exit code 1.
 */
export function buildProgram(deps: ProgramDeps): Command {
  const { services } = deps;
  const program = new Command();

  program
    .name("vuln-pkg")
    .description("Install and run deliberately vulnerable applications for security practice")
    .option("--json", "print machine-readable JSON", false)
    .option("--manifest-url <url>", "manifest URL or local path", deps.manifestUrl)
    .option("--resolve-address <ip>", "IPv4 address embedded in sslip.io hostnames", parseIPv4, "127.0.0.1")
    .option("--domain <domain>", "base domain for app hostnames (default: <resolve-address>.sslip.io)")
    .option("--https", "also route apps over HTTPS", false)
    .option("-y, --yes", "accept unseen manifests without asking", false)
    .option("-v, --verbose", "log diagnostic detail to stderr", false);

  const withContext =
    <A extends unknown[]>(action: (ctx: CommandContext, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      const opts = program.opts<GlobalOptions>();
      if (opts.verbose) setLogLevel("debug");
      const output = new Output(opts.json, deps.writer, deps.color);
      const prompt = deps.prompt ? deps.prompt(output) : terminalTrustPrompt(output);
      const ctx: CommandContext = {
        opts,
        output,
        loadManifest: () =>
          drain(services.manifests.load(opts.manifestUrl, { autoAccept: opts.yes, prompt }), output.onProgress),
      };

      try {
        await services.store.init();
        await services.reconciler.reconcile();
        await action(ctx, ...args);
      } catch (err) {
        logger.debug("Command failed", { err });
        output.failure(err);
        process.exitCode = 1;
      }
    };

  program
    .command("list")
    .description("list applications in the manifest")
    .action(
      withContext(async ({ output, loadManifest }) => {
        const manifest = await loadManifest();
        output.apps(await services.lab.list(manifest));
      }),
    );

  program
    .command("search")
    .description("search applications by name, description or tag")
    .argument("<query>", "text to look for")
    .action(
      withContext(async ({ output, loadManifest }, query: string) => {
        const manifest = await loadManifest();
        output.searchResults(query, await services.lab.search(manifest, query));
      }),
    );

  program
    .command("install")
    .description("pull or build an application's image")
    .argument("<app>", "application name")
    .action(
      withContext(async ({ output, loadManifest }, name: string) => {
        const app = requireApp(await loadManifest(), name);
        output.installed(await drain(services.lab.install(app), output.onProgress));
      }),
    );

  program
    .command("run")
    .description("start an application, installing it first if needed")
    .argument("<app>", "application name")
    .action(
      withContext(async ({ opts, output, loadManifest }, name: string) => {
        const app = requireApp(await loadManifest(), name);
        output.running(await drain(services.lab.run(app, routingFor(opts)), output.onProgress));
      }),
    );

  program
    .command("stop")
    .description("stop a running application")
    .argument("<app>", "application name")
    .action(
      withContext(async ({ output }, name: string) => {
        output.stopped(await services.lab.stop(name));
      }),
    );

  program
    .command("remove")
    .description("remove an application's container")
    .argument("<app>", "application name")
    .option("--purge", "also remove the application's image", false)
    .action(
      withContext(async ({ output }, name: string, cmdOpts: { purge: boolean }) => {
        output.removed(await services.lab.remove(name, { purge: cmdOpts.purge }));
      }),
    );

  program
    .command("rebuild")
    .description("rebuild a Dockerfile or Git application's image")
    .argument("<app>", "application name")
    .action(
      withContext(async ({ output, loadManifest }, name: string) => {
        const app = requireApp(await loadManifest(), name);
        output.rebuilt(await drain(services.lab.rebuild(app), output.onProgress));
      }),
    );

  program
    .command("status")
    .description("show installed applications and their containers")
    .action(
      withContext(async ({ output }) => {
        output.status(await services.lab.status());
      }),
    );

  const manifest = program.command("manifest").description("inspect and manage manifest trust");

  manifest
    .command("show")
    .description("print the current manifest without accepting it")
    .action(
      withContext(async ({ opts, output }) => {
        const fetched = await drain(services.manifests.fetch(opts.manifestUrl), output.onProgress);
        output.manifestShown(fetched, await services.manifests.isAccepted(opts.manifestUrl));
      }),
    );

  manifest
    .command("accepted")
    .description("list accepted manifest URLs")
    .action(
      withContext(async ({ output }) => {
        output.acceptedManifests(await services.trust.list());
      }),
    );

  manifest
    .command("forget")
    .description("revoke acceptance of a manifest URL")
    .argument("[url]", "manifest URL (default: --manifest-url)")
    .action(
      withContext(async ({ opts, output }, url: string | undefined) => {
        const target = url ?? opts.manifestUrl;
        output.manifestForgotten(target, await services.trust.forget(target));
      }),
    );

  return program;
}
