import type { CollectorName } from "../core/models.js";
import type { BaseCollector } from "./base.js";
import { UsersCollector } from "./users.js";
import { LoginsCollector } from "./logins.js";
import { PortsCollector } from "./ports.js";
import { CloudMetadataCollector } from "./cloud.js";

export const COLLECTOR_REGISTRY: Record<CollectorName, BaseCollector> = {
  users: new UsersCollector(),
  logins: new LoginsCollector(),
  ports: new PortsCollector(),
  cloud: new CloudMetadataCollector(),
};

export { BaseCollector } from "./base.js";
