
import { promises as fs } from "fs";
import * as yaml from "yaml";

export const Config = {

  info: {
    name: "host-endpoints-operator"
  },

  logging: {
    level: "info"
  },

  config: {
    file: "config/application.yml"
  },

  server: {
    port: 8080
  },

  target: {
    namespace: "openshift-etcd",
    endpoints: "host-etcd"
  },

  member: {
    roleLabel: "node-role.kubernetes.io/master",
    service: "etcd-server-ssl",
    proto: "tcp",
    portName: "etcd",
    port: 2379
  },

  cluster: {
    network: "cluster",
    infrastructure: "cluster"
  },

  operator: {
    group: "operator.openshift.io",
    version: "v1",
    plural: "etcds",
    name: "cluster"
  },

  queue: {
    workers: 1,
    baseDelay: 5,
    maxDelay: 1000000
  },

  watch: {
    retryDelay: 2000
  }

};

export type AppConfig = typeof Config;

type ConfigScope = Record<string, unknown>;

function isScope(value: unknown): value is ConfigScope {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load environment variables. `SERVER_PORT=9090` overrides `server.port`;
 * only keys that already exist in the config are taken.
 */
export function loadEnvs(env: NodeJS.ProcessEnv = process.env, target: AppConfig = Config): void {
  for (let key in env) {
    let value = env[key];
    if (value === undefined) {
      continue;
    }
    let segments = key.toLowerCase().split("_");
    let scope: ConfigScope = target;
    for (let i = 0; i < segments.length; i++) {
      let isLastSegment = i + 1 >= segments.length;
      let keyName = Object.keys(scope).find(scopeKey => scopeKey.toLowerCase() === segments[i]);
      if (!keyName) {
        break;
      }

      let current = scope[keyName];
      if (isLastSegment) {
        if (!isScope(current)) {
          scope[keyName] = coerce(current, value);
        }
      } else {
        if (!isScope(current)) {
          break;
        }
        scope = current;
      }
    }
  }
}

function coerce(current: unknown, value: string): unknown {
  if (typeof current === "number") {
    let parsed = Number(value);
    return Number.isNaN(parsed) ? current : parsed;
  }
  if (typeof current === "boolean") {
    return value.toLowerCase() === "true";
  }
  return value;
}

/**
 * Load config from a yaml file and merge it over the current values
 */
export async function loadFile(file: string, target: AppConfig = Config): Promise<void> {
  let data = await fs.readFile(file);
  let loadedConfig: unknown = yaml.parse(data.toString());
  if (isScope(loadedConfig)) {
    mergeConfig(target, loadedConfig);
  }
}

function mergeConfig(currentConfig: ConfigScope, newConfig: ConfigScope): void {
  for (let key in newConfig) {
    let currentValue = currentConfig[key];
    let newValue = newConfig[key];
    if (isScope(currentValue) && isScope(newValue)) {
      mergeConfig(currentValue, newValue);
    } else {
      currentConfig[key] = newValue;
    }
  }
}
