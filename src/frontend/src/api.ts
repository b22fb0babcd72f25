import type {
  CalculateRequest,
  CalculateResponse,
  ConvertRequest,
  ConvertResponse,
  ExportFormat,
  HistoryResponse,
} from "./types/api";

const API = "/api/v1";

export class ApiError extends Error {
  constructor(message: string, readonly status: number, readonly code?: string) {
    super(message);
    this.name = "ApiError";
  }
}

function field(data: unknown, key: string): string | undefined {
  if (typeof data !== "object" || data === null || !(key in data)) return undefined;
  const v: unknown = Reflect.get(data, key);
  return typeof v === "string" ? v : undefined;
}

async function readJSON<T>(r: Response): Promise<T> {
  const data: unknown = await r.json().catch(() => ({}));
  if (!r.ok) throw new ApiError(field(data, "error") || `HTTP ${r.status}`, r.status, field(data, "code"));
  return data as T;
}

async function postJSON<T>(url: string, body: unknown): Promise<T> {
  const r = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body ?? {}),
  });
  return readJSON<T>(r);
}

async function getJSON<T>(url: string): Promise<T> {
  return readJSON<T>(await fetch(url, { method: "GET" }));
}

async function deleteJSON<T>(url: string): Promise<T> {
  return readJSON<T>(await fetch(url, { method: "DELETE" }));
}

export function makeApi(base = API) {
  return {
    convert: (req: ConvertRequest) => postJSON<ConvertResponse>(`${base}/convert`, req),
    calculate: (req: CalculateRequest) => postJSON<CalculateResponse>(`${base}/calculate`, req),
    history: (limit = 50) => getJSON<HistoryResponse>(`${base}/history?limit=${limit}`),
    clearHistory: () => deleteJSON<{ removed: number }>(`${base}/history`),
    exportUrl: (format: ExportFormat) => `${base}/history/export?format=${format}`,
  };
}

export type Api = ReturnType<typeof makeApi>;
