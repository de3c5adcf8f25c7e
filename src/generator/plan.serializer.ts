import { stringify as toYaml } from 'yaml';
import type { GeneratedPlan, NodeDefinition } from './interfaces';

export type PlanFormat = 'json' | 'yaml';

interface ExportedService {
  image: string;
  container_name: string;
  hostname: string;
  environment: Record<string, string>;
  ports: string[];
  labels: Record<string, string>;
}

export interface ExportedPlan {
  name: string;
  hash: string;
  settings: GeneratedPlan['settings'];
  services: Record<string, ExportedService>;
}

/**
 * Compose-style view of a plan. Expects definitions that are already redacted.
 */
export function toExportedPlan(plan: GeneratedPlan, nodes: NodeDefinition[]): ExportedPlan {
  const services: Record<string, ExportedService> = {};
  for (const node of nodes) {
    services[node.name] = {
      image: node.image,
      container_name: node.containerName,
      hostname: node.host,
      environment: node.environment,
      ports: node.ports.map((binding) => `${binding.hostPort}:${binding.containerPort}`),
      labels: node.labels,
    };
  }
  return { name: plan.clusterName, hash: plan.hash, settings: plan.settings, services };
}

export function serializePlan(exported: ExportedPlan, format: PlanFormat): string {
  return format === 'yaml' ? toYaml(exported) : JSON.stringify(exported, null, 2);
}
