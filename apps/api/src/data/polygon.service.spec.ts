import { ConfigService } from '@nestjs/config';
import { PolygonService, toDateWindow, toPolygonSpan } from './polygon.service';

const jsonResponse = (body: unknown): Response =>
  new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });

describe('PolygonService', () => {
  let service: PolygonService;
  let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    service = new PolygonService(
      new ConfigService({ POLYGON_API_KEY: 'test-key', POLYGON_BASE_URL: 'https://polygon.test' }),
    );
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('maps aggregates to a price series', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({
        status: 'OK',
        results: [
          { t: Date.parse('2024-03-01T14:00:00Z'), c: 101.5 },
          { t: Date.parse('2024-03-01T14:01:00Z'), c: '102.25' },
        ],
      }),
    );

    const result = await service.fetchSeries('AAPL', '1d', '1m');

    expect(result).toEqual({
      status: 'ok',
      series: [
        { timestamp: new Date('2024-03-01T14:00:00Z'), close: 101.5 },
        { timestamp: new Date('2024-03-01T14:01:00Z'), close: 102.25 },
      ],
    });
    const url = String(fetchSpy.mock.calls[0][0]);
    expect(url.startsWith('https://polygon.test/v2/aggs/ticker/AAPL/range/1/minute/')).toBe(true);
    expect(url.endsWith('&apiKey=test-key')).toBe(true);
  });

  it('keeps null closes as NaN for the engine to drop', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ results: [{ t: 0, c: null }] }));

    const result = await service.fetchSeries('AAPL', '1d', '1m');

    if (result.status !== 'ok') throw new Error(`unexpected status ${result.status}`);
    expect(Number.isNaN(result.series[0].close)).toBe(true);
  });

  it('reports an empty response with the widened period', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ status: 'OK', results: [] }));

    expect(await service.fetchSeries('AAPL', '1d', '1m')).toEqual({
      status: 'data-unavailable',
      reason: 'No data for AAPL (5d@1m)',
    });
  });

  it('keeps the requested period for daily bars', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({}));

    expect(await service.fetchSeries('MSFT', '3mo', '1d')).toEqual({
      status: 'data-unavailable',
      reason: 'No data for MSFT (3mo@1d)',
    });
  });

  it('reports a missing close field', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ results: [{ t: 0, c: 1 }, { t: 60_000 }] }));

    expect(await service.fetchSeries('AAPL', '1d', '1m')).toEqual({
      status: 'data-unavailable',
      reason: "'Close' field missing for AAPL.",
    });
  });

  it('reports a missing or unusable timestamp', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ results: [{ t: 0, c: 1 }, { c: 2 }] }));
    expect(await service.fetchSeries('AAPL', '1d', '1m')).toEqual({
      status: 'data-unavailable',
      reason: "'Timestamp' field missing for AAPL.",
    });

    fetchSpy.mockResolvedValueOnce(jsonResponse({ results: [{ t: 'yesterday', c: 2 }] }));
    expect(await service.fetchSeries('AAPL', '1d', '1m')).toEqual({
      status: 'data-unavailable',
      reason: "'Timestamp' field missing for AAPL.",
    });
  });

  it('treats a null bar as a missing close', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ results: [null] }));

    expect(await service.fetchSeries('AAPL', '1d', '1m')).toEqual({
      status: 'data-unavailable',
      reason: "'Close' field missing for AAPL.",
    });
  });

  it('treats a body that is not an object as no data', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(null));

    expect(await service.fetchSeries('AAPL', '1d', '1m')).toEqual({
      status: 'data-unavailable',
      reason: 'No data for AAPL (5d@1m)',
    });
  });

  it('turns HTTP errors into transport faults', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('oops', { status: 500, statusText: 'Internal Server Error' }));

    expect(await service.fetchSeries('AAPL', '1d', '1m')).toEqual({
      status: 'transport-fault',
      message: 'Fetch error: Polygon API error: 500 Internal Server Error',
    });
  });

  it('turns network errors into transport faults', async () => {
    fetchSpy.mockRejectedValueOnce(new Error('socket hang up'));

    expect(await service.fetchSeries('AAPL', '1d', '1m')).toEqual({
      status: 'transport-fault',
      message: 'Fetch error: socket hang up',
    });
  });

  it('rejects an unsupported interval without calling out', async () => {
    expect(await service.fetchSeries('AAPL', '1d', '1wk')).toEqual({
      status: 'transport-fault',
      message: 'Fetch error: Unsupported interval: 1wk',
    });
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

describe('toPolygonSpan', () => {
  it('maps sample intervals to aggregate spans', () => {
    expect(toPolygonSpan('1m')).toEqual({ mult: 1, span: 'minute' });
    expect(toPolygonSpan('15m')).toEqual({ mult: 15, span: 'minute' });
    expect(toPolygonSpan('1h')).toEqual({ mult: 1, span: 'hour' });
    expect(toPolygonSpan('1d')).toEqual({ mult: 1, span: 'day' });
  });
});

describe('toDateWindow', () => {
  const end = new Date('2024-03-10T15:00:00Z');

  it('counts back from the end date in UTC', () => {
    expect(toDateWindow('5d', end)).toEqual({ from: '2024-03-05', to: '2024-03-10' });
    expect(toDateWindow('1mo', end)).toEqual({ from: '2024-02-10', to: '2024-03-10' });
    expect(toDateWindow('1y', end)).toEqual({ from: '2023-03-10', to: '2024-03-10' });
  });

  it('rejects an unknown period', () => {
    expect(() => toDateWindow('2w', end)).toThrow('Unsupported period: 2w');
  });
});
