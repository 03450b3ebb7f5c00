import { httpPorts } from "../manifest/app.js";
import type { PortConfig } from "../manifest/types.js";
import { ENTRYPOINTS, PROXY_LABEL_PREFIX, type RoutingLabels, type RoutingOptions } from "./types.js";

/** Label that opts a container into proxy discovery. */
export const PROXY_ENABLE_LABEL = `${PROXY_LABEL_PREFIX}.enable`;

function routerKey(router: string, attr: string): string {
  return `${PROXY_LABEL_PREFIX}.http.routers.${router}.${attr}`;
}

function serviceKey(service: string): string {
  return `${PROXY_LABEL_PREFIX}.http.services.${service}.loadbalancer.server.port`;
}

/**
 * Router/subdomain name for the `index`-th HTTP port of an app: the first
 * uses the bare app name, the rest `<name>-<port>`.
 */
export function routerName(appName: string, port: number, index: number): string {
  return index === 0 ? appName : `${appName}-${port}`;
}

/**
 * Derive the proxy labels and hostnames for an app's HTTP ports. TCP/UDP
 * ports are skipped; they are published on host ports instead.
 *
 * Keys are a pure function of the inputs, so the same app always gets
 * byte-identical labels.
 */
export function buildRoutingLabels(appName: string, ports: PortConfig[], options: RoutingOptions): RoutingLabels {
  const labels: Record<string, string> = {};
  const hostnames: string[] = [];

  httpPorts({ ports }).forEach((p, index) => {
    const router = routerName(appName, p.port, index);
    const hostname = `${router}.${options.domain}`;
    const rule = `Host(\`${hostname}\`)`;
    hostnames.push(hostname);

    labels[routerKey(router, "rule")] = rule;
    labels[routerKey(router, "entrypoints")] = ENTRYPOINTS.web;
    labels[routerKey(router, "service")] = router;
    labels[serviceKey(router)] = String(p.port);

    if (options.https) {
      const secure = `${router}-secure`;
      labels[routerKey(secure, "rule")] = rule;
      labels[routerKey(secure, "entrypoints")] = ENTRYPOINTS.websecure;
      labels[routerKey(secure, "tls")] = "true";
      labels[routerKey(secure, "service")] = router;
    }
  });

  return { labels, hostnames };
}
