import type { ServiceDetail, ServiceInstance, ServiceSnapshot } from "#/registry";

/**
 * Format a duration in milliseconds to a short human readable string.
 *
 * @example formatDuration(500) → "500ms"
 * @example formatDuration(1500) → "1.5s"
 * @example formatDuration(90000) → "1m 30s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) {
    const seconds = ms / 1000;
    return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return seconds === 0 ? `${minutes}m` : `${minutes}m ${seconds}s`;
}

/**
 * Hide a secret for display.
 *
 * @example maskSecret("test-secret") → "***"
 * @example maskSecret(undefined) → "(unset)"
 */
export function maskSecret(value: string | undefined): string {
  return value ? "***" : "(unset)";
}

/**
 * One line per instance.
 *
 * @example formatInstance(instance) → "192.168.1.100:8080  weight=1  healthy  cluster=DEFAULT"
 */
export function formatInstance(instance: ServiceInstance): string {
  const parts = [
    `${instance.ip}:${instance.port}`,
    `weight=${instance.weight}`,
    instance.healthy ? "healthy" : "unhealthy",
  ];
  if (!instance.enabled) parts.push("disabled");
  if (instance.clusterName) parts.push(`cluster=${instance.clusterName}`);

  const metadata = Object.entries(instance.metadata);
  if (metadata.length > 0) {
    parts.push(metadata.map(([key, value]) => `${key}=${value}`).join(","));
  }

  return parts.join("  ");
}

export function formatSnapshot(snapshot: ServiceSnapshot): string[] {
  const healthy = snapshot.instances.filter((i) => i.healthy).length;
  const lines = [
    `${snapshot.groupName}/${snapshot.serviceName}: ${snapshot.instances.length} instance(s), ${healthy} healthy`,
  ];
  for (const instance of snapshot.instances) {
    lines.push(`  ${formatInstance(instance)}`);
  }
  return lines;
}

export function formatServiceDetail(detail: ServiceDetail): string[] {
  const lines = [
    `${detail.groupName}/${detail.serviceName}`,
    `  namespace: ${detail.namespaceId ?? "public"}`,
    `  clusters: ${detail.clusters.length > 0 ? detail.clusters.join(", ") : "(none)"}`,
    `  protectThreshold: ${detail.protectThreshold}`,
  ];
  if (detail.instanceCount !== undefined) {
    lines.push(`  instances: ${detail.instanceCount}`);
  }
  return lines;
}
