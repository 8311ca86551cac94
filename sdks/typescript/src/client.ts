import type { ApiErrorResponse, DetectAndReportRequest, DetectAndReportResponse, ReportsResponse } from './types.js';

export interface IncidentApiClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class IncidentApiError extends Error {
  public readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'IncidentApiError';
    this.status = status;
  }
}

const isApiError = (value: unknown): value is ApiErrorResponse =>
  typeof value === 'object' &&
  value !== null &&
  'message' in value &&
  typeof value.message === 'string';

export class IncidentApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: IncidentApiClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async health(): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl}/`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });
    if (!response.ok) {
      throw await this.toError('Health check', response);
    }
    return response.text();
  }

  async detectAndReport(payload: DetectAndReportRequest): Promise<DetectAndReportResponse> {
    const form = new FormData();
    form.append('image', payload.image, payload.fileName ?? 'evidence.jpg');
    if (payload.locationId !== undefined) {
      form.append('location_id', payload.locationId);
    }

    // fetch sets the multipart boundary itself, so no Content-Type here.
    const response = await this.fetchImpl(`${this.baseUrl}/api/detect_and_report`, {
      method: 'POST',
      headers: this.defaultHeaders,
      body: form,
    });

    if (!response.ok) {
      throw await this.toError('Detect request', response);
    }

    return (await response.json()) as DetectAndReportResponse;
  }

  async getReports(): Promise<ReportsResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/api/get_reports`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });

    if (!response.ok) {
      throw await this.toError('Reports request', response);
    }

    return (await response.json()) as ReportsResponse;
  }

  private async toError(action: string, response: Response): Promise<IncidentApiError> {
    const body = await this.readErrorBody(response);
    return new IncidentApiError(`${action} failed with ${response.status}: ${body}`, response.status);
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      if (!text) {
        return '<empty>';
      }
      try {
        const parsed: unknown = JSON.parse(text);
        return isApiError(parsed) ? parsed.message : text;
      } catch {
        return text;
      }
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
