import { OpenAI, APIConnectionTimeoutError } from "openai";
import type { AttemptResult, InferenceService } from "../../types";
import type { ConfidencePenalties } from "../../config";
import { ErrorCodes, ErrorSeverity, IntakeError, toErrorMessage } from "../../utils/error";
import { LoggingService, LogLevel } from "../logging/LoggingService";
import { buildExtractionPrompt } from "./prompt";
import { parseInferenceResponse } from "./normalizeInference";

const MIN_RESPONSE_LENGTH = 10;

export interface InferenceClientOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  penalties: ConfidencePenalties;
  logger?: LoggingService;
}

/**
 * Single-shot client for an OpenAI-compatible inference endpoint (a local
 * Ollama server by default). Retries belong to the caller, so the SDK's own
 * retry loop is switched off.
 */
export class InferenceClient implements InferenceService {
  private openai: OpenAI;
  private logger: LoggingService;

  constructor(private readonly options: InferenceClientOptions) {
    if (!options.baseUrl) {
      throw new IntakeError(
        "Inference endpoint not configured",
        ErrorCodes.INVALID_CONFIGURATION,
        ErrorSeverity.CRITICAL,
        { component: "InferenceClient" }
      );
    }

    this.openai = new OpenAI({
      baseURL: options.baseUrl,
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
    this.logger = options.logger ?? LoggingService.getInstance();
  }

  async attempt(message: string): Promise<AttemptResult> {
    let content: string;

    try {
      const completion = await this.openai.chat.completions.create(
        {
          model: this.options.model,
          messages: [{ role: "user", content: buildExtractionPrompt(message) }],
          temperature: 0.1,
          top_p: 0.9,
          max_tokens: 150,
        },
        { timeout: this.options.timeoutMs, maxRetries: 0 }
      );
      content = completion.choices[0]?.message?.content ?? "";
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        this.logger.log(LogLevel.WARN, "Inference request timed out", "InferenceClient", {
          timeoutMs: this.options.timeoutMs,
        });
        return { status: "timeout", error: toErrorMessage(error) };
      }

      this.logger.log(LogLevel.WARN, "Inference request failed", "InferenceClient", {
        originalError: toErrorMessage(error),
      });
      return { status: "failed", error: toErrorMessage(error) };
    }

    if (content.trim().length < MIN_RESPONSE_LENGTH) {
      return {
        status: "malformed",
        error: "Inference response too short",
        rawResponse: content,
      };
    }

    const record = parseInferenceResponse(content, message, this.options.penalties);
    if (!record) {
      this.logger.log(LogLevel.WARN, "No JSON object in inference response", "InferenceClient", {
        rawResponse: content,
      });
      return {
        status: "malformed",
        error: "No JSON object in inference response",
        rawResponse: content,
      };
    }

    return { status: "ok", record, rawResponse: content };
  }

  async checkConnection(): Promise<boolean> {
    try {
      await this.openai.models.list({ timeout: 10_000, maxRetries: 0 });
      return true;
    } catch (error) {
      this.logger.log(LogLevel.WARN, "Inference connection check failed", "InferenceClient", {
        originalError: toErrorMessage(error),
      });
      return false;
    }
  }
}
