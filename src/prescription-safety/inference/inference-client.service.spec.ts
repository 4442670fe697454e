import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import { InferenceClientService } from './inference-client.service';
import {
  PRESCRIPTION_SAFETY_OPTIONS,
  PrescriptionSafetyOptions,
  resolvePrescriptionSafetyOptions,
} from '../config/prescription-safety.config';
import { ANALYSIS_SYSTEM_PROMPT } from '../constants/analysis-prompt';
import {
  AnalysisCancelledError,
  ConfigurationError,
  ProtocolError,
  TransportError,
} from '../errors/analysis.errors';

function axiosResponse(status: number, data: unknown): AxiosResponse<unknown> {
  return {
    data,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

function completion(content: unknown): AxiosResponse<unknown> {
  return axiosResponse(200, { choices: [{ message: { content } }] });
}

describe('InferenceClientService', () => {
  let service: InferenceClientService;
  let post: jest.Mock;

  async function createService(
    overrides: Partial<PrescriptionSafetyOptions> = {},
  ): Promise<InferenceClientService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        InferenceClientService,
        {
          provide: HttpService,
          useValue: { post },
        },
        {
          provide: PRESCRIPTION_SAFETY_OPTIONS,
          useValue: resolvePrescriptionSafetyOptions({
            apiKey: 'test-key',
            referer: 'https://rx.example.test',
            timeoutMs: 5000,
            ...overrides,
          }),
        },
      ],
    }).compile();

    return module.get<InferenceClientService>(InferenceClientService);
  }

  beforeEach(async () => {
    post = jest.fn();
    service = await createService();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
    expect(service.isConfigured).toBe(true);
  });

  it('should post the chat completion request and return the content', async () => {
    post.mockReturnValue(of(completion('{"overall_risk": "low"}')));

    const content = await service.invoke('Analyze this prescription');

    expect(content).toBe('{"overall_risk": "low"}');
    expect(post).toHaveBeenCalledWith(
      'https://openrouter.ai/api/v1/chat/completions',
      {
        model: 'openai/gpt-4o-mini',
        messages: [
          { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
          { role: 'user', content: 'Analyze this prescription' },
        ],
        max_tokens: 2000,
        temperature: 0.3,
      },
      {
        headers: {
          Authorization: 'Bearer test-key',
          'Content-Type': 'application/json',
          'HTTP-Referer': 'https://rx.example.test',
          'X-Title': 'Prescription Safety Service',
        },
        timeout: 5000,
        signal: undefined,
      },
    );
  });

  it('should use the configured model and generation settings', async () => {
    service = await createService({
      model: 'test/model',
      maxTokens: 512,
      temperature: 0,
      systemPrompt: 'Answer in JSON.',
    });

    expect(service.buildRequest('prompt')).toEqual({
      model: 'test/model',
      messages: [
        { role: 'system', content: 'Answer in JSON.' },
        { role: 'user', content: 'prompt' },
      ],
      max_tokens: 512,
      temperature: 0,
    });
  });

  it('should fail with ConfigurationError when no API key is set', async () => {
    service = await createService({ apiKey: undefined });

    expect(service.isConfigured).toBe(false);
    await expect(service.invoke('prompt')).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(post).not.toHaveBeenCalled();
  });

  it('should map an error status to ProtocolError', async () => {
    post.mockReturnValue(
      throwError(
        () =>
          new AxiosError(
            'Request failed with status code 503',
            'ERR_BAD_RESPONSE',
            undefined,
            undefined,
            axiosResponse(503, { error: 'unavailable' }),
          ),
      ),
    );

    const error = await service.invoke('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({
      status: 503,
      message: 'Inference endpoint responded with status 503',
      retryable: true,
    });
  });

  it.each([401, 403])(
    'should map a rejected credential (status %i) to ConfigurationError',
    async (status) => {
      post.mockReturnValue(
        throwError(
          () =>
            new AxiosError(
              `Request failed with status code ${status}`,
              'ERR_BAD_REQUEST',
              undefined,
              undefined,
              axiosResponse(status, { error: 'invalid key' }),
            ),
        ),
      );

      const error = await service.invoke('prompt').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message: `Inference endpoint rejected the API key (status ${status})`,
        retryable: false,
      });
    },
  );

  it('should map a timeout to TransportError', async () => {
    post.mockReturnValue(
      throwError(
        () => new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'),
      ),
    );

    const error = await service.invoke('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'Inference request timed out after 5000ms',
      retryable: true,
    });
  });

  it('should map a network failure to TransportError', async () => {
    post.mockReturnValue(
      throwError(() => new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED')),
    );

    const error = await service.invoke('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'Inference request failed: connect ECONNREFUSED',
    });
  });

  it('should reject an envelope without choices', async () => {
    post.mockReturnValue(of(axiosResponse(200, { choices: [] })));

    await expect(service.invoke('prompt')).rejects.toBeInstanceOf(
      ProtocolError,
    );
  });

  it('should reject a non-string message content', async () => {
    post.mockReturnValue(of(completion({ text: 'not a string' })));

    await expect(service.invoke('prompt')).rejects.toThrow(
      'Inference response has no completion message content',
    );
  });

  it('should reject blank message content', async () => {
    post.mockReturnValue(of(completion('   ')));

    await expect(service.invoke('prompt')).rejects.toThrow(
      'Inference response content is empty',
    );
  });

  it('should report cancellation when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    post.mockReturnValue(
      throwError(() => new AxiosError('canceled', 'ERR_CANCELED')),
    );

    await expect(
      service.invoke('prompt', controller.signal),
    ).rejects.toBeInstanceOf(AnalysisCancelledError);
    expect(post.mock.calls[0][2]).toMatchObject({ signal: controller.signal });
  });
});
