import type Docker from "dockerode";
import { logger } from "../config/logger.js";
import { ROUTING_LABEL } from "../proxy/labels.js";
import type { WorkloadRecord } from "../proxy/types.js";
import type { WorkloadInventory, WorkloadState } from "./types.js";

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "statusCode" in err && err.statusCode === 404;
}

function containerName(info: Docker.ContainerInfo): string {
  const first = info.Names.find((name) => name.trim() !== "");
  return first ? first.replace(/^\//, "") : info.Id.slice(0, 12);
}

/**
 * Workload inventory backed by the Docker Engine API.
 */
export class DockerInventory implements WorkloadInventory {
  private readonly docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  async listWorkloads(): Promise<WorkloadRecord[]> {
    const containers = await this.docker.listContainers({ filters: { label: [ROUTING_LABEL] } });

    const workloads: WorkloadRecord[] = [];
    for (const info of containers) {
      // Older engines omit Labels from the list payload; inspect instead.
      const labels = info.Labels ?? (await this.getLabels(info.Id));
      workloads.push({ id: info.Id, name: containerName(info), labels: { ...labels } });
    }
    logger.debug(`Found ${workloads.length} container(s) with ${ROUTING_LABEL} labels`);
    return workloads;
  }

  async getLabels(id: string): Promise<Record<string, string>> {
    try {
      const info = await this.docker.getContainer(id).inspect();
      return info.Config.Labels ?? {};
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }
  }

  async getState(nameOrId: string): Promise<WorkloadState | null> {
    try {
      const info = await this.docker.getContainer(nameOrId).inspect();
      return {
        running: info.State.Running,
        status: info.State.Status,
        health: info.State.Health?.Status ?? "none",
      };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }
}
