/*
Client for the JupyterLab REST API of the server the notebooks run on.

Kernel resource usage comes from the jupyter-resource-usage server
extension, which must be installed on that server:

    GET /api/metrics/v1/kernel_usage/get_usage/<kernel_id>

Every request failure is thrown as a JupyterLabRequestError; nothing here
retries.
*/

import { readFile } from "node:fs/promises";
import { basename } from "node:path";

import getLogger from "@nbperf/backend/logger";
import { finiteNumber, isRecord } from "@nbperf/util/misc";

import { JupyterLabRequestError } from "./errors";

const logger = getLogger("jupyter:jupyterlab-client");

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

type Method = "GET" | "POST" | "PUT" | "DELETE";

// What the kernel usage endpoint reports; any field may be missing, e.g.
// while the kernel is starting.
export interface KernelUsage {
  pid?: number;
  // percent of one cpu
  kernel_cpu?: number;
  // bytes
  kernel_memory?: number;
  host_cpu_percent?: number;
  // bytes
  host_memory_total?: number;
}

export interface JupyterSession {
  id: string;
  path?: string;
  name?: string;
  type?: string;
  kernel?: { id: string; name?: string };
}

export interface JupyterKernel {
  id: string;
  name: string;
  execution_state?: string;
}

function parseKernelUsage(value: unknown): KernelUsage {
  if (!isRecord(value)) return {};
  const usage: KernelUsage = {};
  const pid = finiteNumber(value.pid);
  if (pid != null) usage.pid = pid;
  const kernel_cpu = finiteNumber(value.kernel_cpu);
  if (kernel_cpu != null) usage.kernel_cpu = kernel_cpu;
  const kernel_memory = finiteNumber(value.kernel_memory);
  if (kernel_memory != null) usage.kernel_memory = kernel_memory;
  const host_cpu_percent = finiteNumber(value.host_cpu_percent);
  if (host_cpu_percent != null) usage.host_cpu_percent = host_cpu_percent;
  const host = value.host_virtual_memory;
  const total = isRecord(host) ? finiteNumber(host.total) : undefined;
  if (total != null) usage.host_memory_total = total;
  return usage;
}

function parseSession(value: unknown): JupyterSession | undefined {
  if (!isRecord(value) || typeof value.id !== "string") return;
  const session: JupyterSession = { id: value.id };
  if (typeof value.path === "string") session.path = value.path;
  if (typeof value.name === "string") session.name = value.name;
  if (typeof value.type === "string") session.type = value.type;
  const { kernel } = value;
  if (isRecord(kernel) && typeof kernel.id === "string") {
    session.kernel = {
      id: kernel.id,
      name: typeof kernel.name === "string" ? kernel.name : undefined,
    };
  }
  return session;
}

function parseKernel(value: unknown): JupyterKernel | undefined {
  if (!isRecord(value) || typeof value.id !== "string" || typeof value.name !== "string") {
    return;
  }
  return {
    id: value.id,
    name: value.name,
    execution_state:
      typeof value.execution_state === "string" ? value.execution_state : undefined,
  };
}

function list<T>(value: unknown, parse: (x: unknown) => T | undefined): T[] {
  if (!Array.isArray(value)) return [];
  const out: T[] = [];
  for (const x of value) {
    const parsed = parse(x);
    if (parsed != null) out.push(parsed);
  }
  return out;
}

function contentsPath(filename: string): string {
  return filename.split("/").map(encodeURIComponent).join("/");
}

export class JupyterLabClient {
  readonly url: string;
  private readonly token: string;
  private readonly fetch: FetchLike;

  constructor(url: string, token: string, fetchImpl: FetchLike = fetch) {
    this.url = url.replace(/\/+$/, "");
    this.token = token;
    this.fetch = fetchImpl;
  }

  private get headers(): Record<string, string> {
    return {
      Authorization: `token ${this.token}`,
      "Content-Type": "application/json",
    };
  }

  private async request(method: Method, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.url}${path}`;
    logger.debug(method, url);
    const response = await this.fetch(url, {
      method,
      headers: this.headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!response.ok) {
      throw new JupyterLabRequestError(method, url, response.status, response.statusText);
    }
    const text = await response.text();
    return text ? JSON.parse(text) : undefined;
  }

  // URL that opens the notebook in the JupyterLab UI.
  notebookUrl(filename: string): string {
    return `${this.url}/lab/tree/${contentsPath(filename)}?token=${encodeURIComponent(this.token)}`;
  }

  async listSessions(): Promise<JupyterSession[]> {
    return list(await this.request("GET", "/api/sessions"), parseSession);
  }

  async listKernels(): Promise<JupyterKernel[]> {
    return list(await this.request("GET", "/api/kernels"), parseKernel);
  }

  /**
   * Shut down every session (notebooks, consoles and terminals) so a
   * profiling run starts from a quiet server.
   */
  async clearAllSessions(): Promise<void> {
    const sessions = await this.listSessions();
    if (sessions.length === 0) {
      logger.info("no active sessions found");
      return;
    }
    logger.info(`found ${sessions.length} active sessions, shutting them down...`);
    for (const session of sessions) {
      await this.request("DELETE", `/api/sessions/${encodeURIComponent(session.id)}`);
      if (session.kernel != null) {
        logger.info(`shut down notebook/console session: ${session.path} (id: ${session.id})`);
      } else if (session.type === "terminal") {
        logger.info(`shut down terminal session: ${session.name} (id: ${session.id})`);
      } else {
        logger.info(`shut down session (id: ${session.id})`);
      }
    }
  }

  async getKernelIdFromName(kernelName: string): Promise<string | undefined> {
    const kernel = (await this.listKernels()).find((k) => k.name === kernelName);
    if (kernel == null) {
      logger.warn(`no active kernel found for kernel name: ${kernelName}`);
    }
    return kernel?.id;
  }

  // Restart the running kernel with this name; a no-op when there is none.
  async restartKernel(kernelName: string): Promise<void> {
    const id = await this.getKernelIdFromName(kernelName);
    if (id == null) return;
    await this.request("POST", `/api/kernels/${encodeURIComponent(id)}/restart`);
    logger.info(`kernel ${id} restarted`);
  }

  /**
   * Upload a local notebook file into the server's root directory under
   * its base name, and return that name.
   */
  async uploadNotebook(path: string): Promise<string> {
    const filename = basename(path);
    const content: unknown = JSON.parse(await readFile(path, "utf8"));
    logger.info(`uploading notebook ${filename}`);
    await this.request("PUT", `/api/contents/${contentsPath(filename)}`, {
      content,
      type: "notebook",
      format: "json",
    });
    return filename;
  }

  async deleteNotebook(filename: string): Promise<void> {
    logger.info(`deleting notebook ${filename}`);
    await this.request("DELETE", `/api/contents/${contentsPath(filename)}`);
  }

  // Kernel of the session that has this notebook open.
  async getKernelIdForNotebook(filename: string): Promise<string | undefined> {
    const session = (await this.listSessions()).find(
      (s) => s.path === filename && s.kernel != null,
    );
    return session?.kernel?.id;
  }

  async getKernelUsage(kernelId: string): Promise<KernelUsage> {
    const data = await this.request(
      "GET",
      `/api/metrics/v1/kernel_usage/get_usage/${encodeURIComponent(kernelId)}`,
    );
    return parseKernelUsage(isRecord(data) ? data.content : undefined);
  }
}
