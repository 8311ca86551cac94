import { describe, expect, it, vi } from 'vitest';
import { IncidentApiClient, IncidentApiError } from '../src/client.js';

const createFetch = (handlers: Record<string, (init?: RequestInit) => Promise<Response>>) => {
  return vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
    const key = `${init?.method ?? 'GET'} ${url.toString()}`;
    const handler = handlers[key];
    if (!handler) {
      throw new Error(`No handler for ${key}`);
    }
    return handler(init);
  });
};

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('IncidentApiClient', () => {
  it('uploads the image and location as multipart form data', async () => {
    let sent: FormData | undefined;
    const fetchMock = createFetch({
      'POST https://api.example.test/api/detect_and_report': async (init) => {
        sent = init?.body instanceof FormData ? init.body : undefined;
        return json(
          {
            success: true,
            incident_id: '65f0c0ffee',
            location: 'Main Library',
            detection_type: 'Spill Detected',
            confidence: 93.4,
            is_alert: true,
          },
          201,
        );
      },
    });

    const client = new IncidentApiClient({ baseUrl: 'https://api.example.test/', fetchImpl: fetchMock });
    const result = await client.detectAndReport({
      image: new Blob(['fake-image'], { type: 'image/jpeg' }),
      fileName: 'spill.jpg',
      locationId: 'Main Library',
    });

    expect(result.detection_type).toBe('Spill Detected');
    expect(result.is_alert).toBe(true);
    expect(sent?.get('location_id')).toBe('Main Library');
    expect(sent?.get('image')).toBeInstanceOf(Blob);
    expect(sent?.get('image')).toHaveProperty('name', 'spill.jpg');
  });

  it('omits the location when none is given', async () => {
    let sent: FormData | undefined;
    const fetchMock = createFetch({
      'POST https://api.example.test/api/detect_and_report': async (init) => {
        sent = init?.body instanceof FormData ? init.body : undefined;
        return json({ success: true, incident_id: null, location: 'Unknown Zone', detection_type: 'Graffiti', confidence: 90, is_alert: true }, 201);
      },
    });

    const client = new IncidentApiClient({ baseUrl: 'https://api.example.test', fetchImpl: fetchMock });
    const result = await client.detectAndReport({ image: new Blob(['x']) });

    expect(result.incident_id).toBeNull();
    expect(sent?.has('location_id')).toBe(false);
  });

  it('surfaces the server message on a rejected upload', async () => {
    const fetchMock = createFetch({
      'POST https://api.example.test/api/detect_and_report': async () =>
        json({ success: false, message: 'No image file provided' }, 400),
    });

    const client = new IncidentApiClient({ baseUrl: 'https://api.example.test', fetchImpl: fetchMock });
    const failure = client.detectAndReport({ image: new Blob([]) });

    await expect(failure).rejects.toBeInstanceOf(IncidentApiError);
    await expect(failure).rejects.toMatchObject({
      status: 400,
      message: 'Detect request failed with 400: No image file provided',
    });
  });

  it('retrieves dashboard reports', async () => {
    const fetchMock = createFetch({
      'GET https://api.example.test/api/get_reports': async () =>
        json({
          generatedAt: '2026-01-01T00:00:00.000Z',
          summary: { totalDetections: 2, totalAlerts: 1, avgConfidence: '90.5%' },
          detectionTypes: { Graffiti: 1, 'Litter Detected': 1 },
          hourlyData: new Array(24).fill(0),
          heatmapData: [{ location: 'Gym', score: 90 }],
        }),
    });

    const client = new IncidentApiClient({ baseUrl: 'https://api.example.test', fetchImpl: fetchMock });
    const report = await client.getReports();

    expect(report.summary.avgConfidence).toBe('90.5%');
    expect(report.heatmapData).toEqual([{ location: 'Gym', score: 90 }]);
    expect(fetchMock).toHaveBeenCalledWith('https://api.example.test/api/get_reports', expect.any(Object));
  });

  it('returns the health text and reports plain-text failures', async () => {
    const healthy = createFetch({
      'GET https://api.example.test/': async () => new Response('Campus Cleanliness Monitoring API is running (store: unavailable).'),
    });
    const client = new IncidentApiClient({ baseUrl: 'https://api.example.test', fetchImpl: healthy });
    await expect(client.health()).resolves.toBe('Campus Cleanliness Monitoring API is running (store: unavailable).');

    const broken = createFetch({
      'GET https://api.example.test/api/get_reports': async () => new Response('upstream down', { status: 502 }),
    });
    const failing = new IncidentApiClient({ baseUrl: 'https://api.example.test', fetchImpl: broken });
    await expect(failing.getReports()).rejects.toThrow('Reports request failed with 502: upstream down');
  });

  it('requires a base url', () => {
    expect(() => new IncidentApiClient({ baseUrl: '' })).toThrow('baseUrl is required');
  });
});
