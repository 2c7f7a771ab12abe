import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DeskpilotEnv,
  PerceptionMalformedError,
  PerceptionUnavailableError,
  errorMessage,
  isDeskpilotError,
} from '@deskpilot/shared';
import {
  OmniParserOptions,
  OmniParserResponse,
  omniParserHealthSchema,
  omniParserResponseSchema,
} from '../types/omniparser.types';

/**
 * Client service for the OmniParser REST API
 *
 * Unreachable, timed-out and non-2xx calls surface as
 * PerceptionUnavailableError; bodies that do not fit the response schema
 * surface as PerceptionMalformedError. An empty `elements` list is a valid
 * answer.
 */
@Injectable()
export class OmniParserClientService {
  private readonly logger = new Logger(OmniParserClientService.name);
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly enabled: boolean;
  private readonly includeCaptions: boolean;
  private readonly HEALTH_TIMEOUT_MS = 5000;

  constructor(configService: ConfigService<DeskpilotEnv, true>) {
    this.baseUrl = configService
      .get('OMNIPARSER_URL', { infer: true })
      .replace(/\/+$/, '');
    this.timeout = configService.get('OMNIPARSER_TIMEOUT_MS', { infer: true });
    this.enabled = configService.get('OMNIPARSER_ENABLED', { infer: true });
    this.includeCaptions = configService.get('OMNIPARSER_INCLUDE_CAPTIONS', {
      infer: true,
    });

    if (this.enabled) {
      this.logger.log(`OmniParser client initialized: ${this.baseUrl}`);
    } else {
      this.logger.log('OmniParser integration disabled');
    }
  }

  /**
   * Check if OmniParser service is available
   */
  async isAvailable(): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }
    return this.checkHealth();
  }

  /**
   * Check health of OmniParser service
   */
  async checkHealth(): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.HEALTH_TIMEOUT_MS,
    );

    try {
      const response = await fetch(`${this.baseUrl}/health`, {
        signal: controller.signal,
      });
      if (!response.ok) {
        return false;
      }

      const health = omniParserHealthSchema.safeParse(await response.json());
      return (
        health.success &&
        health.data.status === 'healthy' &&
        health.data.models_loaded
      );
    } catch (error) {
      this.logger.debug(`Health check failed: ${errorMessage(error)}`);
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Parse screenshot using OmniParser
   *
   * @param imageBuffer - PNG bytes of the image to parse
   */
  async parseScreenshot(
    imageBuffer: Buffer,
    options: OmniParserOptions = {},
  ): Promise<OmniParserResponse> {
    if (!this.enabled) {
      throw new PerceptionUnavailableError('OmniParser is disabled');
    }

    const startTime = Date.now();
    const requestBody = {
      image: imageBuffer.toString('base64'),
      include_captions: options.includeCaptions ?? this.includeCaptions,
      include_som: false,
      min_confidence: options.minConfidence ?? 0.05,
      iou_threshold: options.iouThreshold ?? 0.1,
    };

    const { signal } = options;
    if (signal?.aborted) {
      throw new PerceptionUnavailableError('OmniParser request aborted');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let raw: string;
    try {
      const response = await fetch(`${this.baseUrl}/parse`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(requestBody),
        signal: controller.signal,
      });

      raw = await response.text();
      if (!response.ok) {
        throw new PerceptionUnavailableError(
          `OmniParser request failed: ${response.status} ${raw}`.trim(),
        );
      }
    } catch (error) {
      if (isDeskpilotError(error)) {
        throw error;
      }
      const reason = timedOut
        ? `timed out after ${this.timeout}ms`
        : signal?.aborted
          ? 'aborted'
          : errorMessage(error);
      throw new PerceptionUnavailableError(
        `OmniParser request failed: ${reason}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    const result = this.parseResponseBody(raw);
    const elapsed = Date.now() - startTime;
    this.logger.debug(
      `OmniParser detected ${result.elements.length} elements in ${elapsed}ms (service: ${result.processing_time_ms ?? 'n/a'}ms)`,
    );

    return result;
  }

  private parseResponseBody(raw: string): OmniParserResponse {
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (error) {
      throw new PerceptionMalformedError(
        `OmniParser returned a body that is not JSON: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const parsed = omniParserResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new PerceptionMalformedError(
        `OmniParser response does not match the expected shape: ${issues}`,
      );
    }
    return parsed.data;
  }
}
