import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { fakePng, silenceConsole } from '../../__tests__/helpers';
import type { ImageryArtifact } from '../../types/satellite';
import { createTimeWindow } from '../../utils/dates';
import { createLocation } from '../../utils/geo';
import { AnalysisCancelledError, VisionCallError } from '../errors';
import { AnthropicVisionClient, type VisionInput } from '../visionService';

function artifact(servedDate: string, contentType = 'image/png', fill = 0x2a): ImageryArtifact {
  const payload = fakePng(1024, fill);
  return {
    payload,
    provenance: {
      layer: 'viirs_day',
      layerId: 'VIIRS_SNPP_CorrectedReflectance_TrueColor',
      requestedDate: servedDate,
      servedDate,
      boundingBox: { minLat: -3.5, minLon: -62.3, maxLat: -3.4, maxLon: -62.2 },
      byteSize: payload.length,
      contentType,
      fetchedAt: '2024-07-01T00:00:00.000Z',
      fromCache: false,
    },
  };
}

function visionInput(overrides: Partial<VisionInput> = {}): VisionInput {
  return {
    before: artifact('2023-06-15', 'image/png', 0x01),
    after: artifact('2024-06-15', 'image/png', 0x02),
    location: createLocation('Amazon', -3.4653, -62.2159),
    timeWindow: createTimeWindow('2023-06-15', '2024-06-15'),
    analysisType: 'deforestation',
    ...overrides,
  };
}

const MESSAGE = {
  id: 'msg_test_1',
  type: 'message',
  role: 'assistant',
  model: 'claude-test',
  content: [{ type: 'text', text: '{"change_type": "deforestation", "severity": "high"}' }],
  usage: { input_tokens: 1200, output_tokens: 150 },
};

function respondWith(data: unknown, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    return { data, status: 200, statusText: 'OK', headers: {}, config };
  };
}

describe('AnthropicVisionClient', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('requires an API key', () => {
    expect(() => new AnthropicVisionClient({})).toThrow(VisionCallError);
  });

  it('sends both images and the prompt to the messages endpoint', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = new AnthropicVisionClient({
      apiKey: 'test-secret',
      model: 'claude-test',
      maxTokens: 1234,
      adapter: respondWith(MESSAGE, seen),
    });
    const input = visionInput();

    await client.compare(input);

    expect(seen).toHaveLength(1);
    const [config] = seen;
    expect(config.method).toBe('post');
    expect(config.url).toBe('/messages');
    expect(config.headers['x-api-key']).toBe('test-secret');
    expect(config.headers['anthropic-version']).toBe('2023-06-01');

    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    expect(body).toMatchObject({
      model: 'claude-test',
      max_tokens: 1234,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image',
              source: { type: 'base64', media_type: 'image/png', data: input.before.payload.toString('base64') },
            },
            {
              type: 'image',
              source: { type: 'base64', media_type: 'image/png', data: input.after.payload.toString('base64') },
            },
            { type: 'text', text: expect.stringContaining('DEFORESTATION FOCUS:') },
          ],
        },
      ],
    });
  });

  it('returns the raw text with usage and call id', async () => {
    const client = new AnthropicVisionClient({ apiKey: 'test-secret', adapter: respondWith(MESSAGE) });

    await expect(client.compare(visionInput())).resolves.toEqual({
      raw: '{"change_type": "deforestation", "severity": "high"}',
      usage: { inputUnits: 1200, outputUnits: 150 },
      callId: 'msg_test_1',
      model: 'claude-test',
    });
  });

  it('wraps API errors', async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError('Request failed with status code 401', 'ERR_BAD_REQUEST', config, null, {
        data: { type: 'error', error: { type: 'authentication_error', message: 'invalid x-api-key' } },
        status: 401,
        statusText: 'Unauthorized',
        headers: {},
        config,
      });
    };
    const client = new AnthropicVisionClient({ apiKey: 'test-secret', adapter });

    const error = await client.compare(visionInput()).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(VisionCallError);
    expect(error).toHaveProperty('message', 'Vision request failed (HTTP 401): invalid x-api-key');
  });

  it('rejects an unexpected response body', async () => {
    const client = new AnthropicVisionClient({ apiKey: 'test-secret', adapter: respondWith({ ok: true }) });
    await expect(client.compare(visionInput())).rejects.toThrow(/Unexpected vision response/);
  });

  it('rejects image types the model cannot read', async () => {
    const client = new AnthropicVisionClient({ apiKey: 'test-secret', adapter: respondWith(MESSAGE) });
    await expect(client.compare(visionInput({ before: artifact('2023-06-15', 'image/tiff') }))).rejects.toThrow(
      'Unsupported image type for vision: image/tiff'
    );
  });

  it('does not call out once cancelled', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = new AnthropicVisionClient({ apiKey: 'test-secret', adapter: respondWith(MESSAGE, seen) });
    const controller = new AbortController();
    controller.abort();

    await expect(client.compare(visionInput(), controller.signal)).rejects.toBeInstanceOf(AnalysisCancelledError);
    expect(seen).toHaveLength(0);
  });
});
