import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { Bill, ReasoningRequest, ReasoningResult, ReasoningService } from '../types';
import { RESEARCH_SYSTEM_PROMPT } from '../config/prompts';
import { ExternalServiceError, toExternalServiceError } from '../utils/errors';

interface ChatCompletionLike {
  model: string;
  choices: Array<{
    finish_reason: string;
    message: { content: string | null };
  }>;
}

/**
 * The slice of the OpenAI client this service calls
 */
export interface ChatCompletionCreator {
  create(
    body: ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; maxRetries?: number }
  ): PromiseLike<ChatCompletionLike>;
}

export interface OpenAIReasoningServiceConfig {
  model: string;
  apiKey?: string;
  systemPrompt?: string;
}

/**
 * Maps OpenAI SDK errors onto the transient/permanent taxonomy
 */
export function classifyOpenAIError(error: unknown): ExternalServiceError {
  if (error instanceof ExternalServiceError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
    return new ExternalServiceError('transient', 'timeout', error.message);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ExternalServiceError('transient', 'network', error.message);
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const code = typeof error.code === 'string' ? error.code : undefined;

    if (status === 429) {
      return code === 'insufficient_quota'
        ? new ExternalServiceError('permanent', 'quotaExceeded', error.message, { status })
        : new ExternalServiceError('transient', 'rateLimit', error.message, { status });
    }
    if (status !== undefined && status >= 500) {
      return new ExternalServiceError('transient', 'serverError', error.message, { status });
    }
    if (status === 401 || status === 403) {
      return new ExternalServiceError('permanent', 'authentication', error.message, { status });
    }
    if (code === 'content_policy_violation' || code === 'content_filter') {
      return new ExternalServiceError('permanent', 'contentPolicy', error.message, { status });
    }
    if (status === 408) {
      return new ExternalServiceError('transient', 'timeout', error.message, { status });
    }
    if (status !== undefined && status >= 400) {
      return new ExternalServiceError('permanent', 'badRequest', error.message, { status });
    }
  }
  return toExternalServiceError(error);
}

export function buildMessages(
  request: ReasoningRequest,
  systemPrompt: string = RESEARCH_SYSTEM_PROMPT
): ChatCompletionMessageParam[] {
  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: formatUserMessage(request.text, request.contextDocuments) },
  ];
}

function formatUserMessage(text: string, bills: Bill[]): string {
  if (bills.length === 0) {
    return text;
  }
  const lines = bills.map((bill) => `- ${bill.filename} (id: ${bill.id}, status: ${bill.status})`);
  return `${text}\n\nAttached bills:\n${lines.join('\n')}`;
}

/**
 * Reasoning service backed by OpenAI chat completions. Retries are left to
 * ReasoningClient, so the SDK's own retry loop is disabled.
 */
export class OpenAIReasoningService implements ReasoningService {
  private readonly completions: ChatCompletionCreator | null;
  private readonly systemPrompt: string;

  constructor(
    private readonly config: OpenAIReasoningServiceConfig,
    completions?: ChatCompletionCreator
  ) {
    this.systemPrompt = config.systemPrompt ?? RESEARCH_SYSTEM_PROMPT;
    if (completions) {
      this.completions = completions;
    } else if (config.apiKey) {
      this.completions = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 }).chat.completions;
    } else {
      this.completions = null;
    }
  }

  async complete(request: ReasoningRequest, signal: AbortSignal): Promise<ReasoningResult> {
    if (!this.completions) {
      throw new ExternalServiceError(
        'permanent',
        'authentication',
        'Reasoning service credential is not configured (OPENAI_API_KEY)'
      );
    }

    let completion: ChatCompletionLike;
    try {
      completion = await this.completions.create(
        {
          model: this.config.model,
          messages: buildMessages(request, this.systemPrompt),
        },
        { signal, maxRetries: 0 }
      );
    } catch (error) {
      throw classifyOpenAIError(error);
    }

    const choice = completion.choices[0];
    if (choice?.finish_reason === 'content_filter') {
      throw new ExternalServiceError(
        'permanent',
        'contentPolicy',
        'The answer was withheld by the content policy filter'
      );
    }

    const answer = choice?.message.content?.trim();
    if (!answer) {
      throw new ExternalServiceError('permanent', 'emptyResponse', 'Reasoning service returned no answer');
    }

    return { answer, model: completion.model };
  }
}
