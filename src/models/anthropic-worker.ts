// ═══════════════════════════════════════════════════════════════
// Models :: Worker (Anthropic Messages API)
// The base URL is configurable, so any server that speaks the
// Messages protocol can sit behind it. Retries and transport
// timeouts belong to the SDK client, not to the turn state machine.
// ═══════════════════════════════════════════════════════════════

import type Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type {
  ConversationMessage, ToolDescriptor, WorkerModel, WorkerRequest, WorkerResponse,
} from '../core/types.js';

/** The slice of the SDK client the adapters use. */
export interface MessagesApi {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal },
  ): PromiseLike<Anthropic.Message>;
}

export interface AnthropicWorkerOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

const ToolInputSchema = z.record(z.string(), z.unknown());

export function toAnthropicTools(tools: readonly ToolDescriptor[]): Anthropic.Tool[] {
  return tools.map(t => ({
    name: t.name,
    description: t.description,
    input_schema: {
      type: 'object' as const,
      properties: Object.fromEntries(t.requiredArguments.map(arg => [arg, { type: 'string' }])),
      required: [...t.requiredArguments],
    },
  }));
}

export function toAnthropicMessages(history: readonly ConversationMessage[]): Anthropic.MessageParam[] {
  return history.map((message): Anthropic.MessageParam => {
    switch (message.role) {
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      case 'tool_call':
        return {
          role: 'assistant',
          content: [
            ...(message.text ? [{ type: 'text' as const, text: message.text }] : []),
            { type: 'tool_use' as const, id: message.callId, name: message.toolName, input: message.arguments },
          ],
        };
      case 'tool_result':
        return {
          role: 'user',
          content: [{
            type: 'tool_result' as const,
            tool_use_id: message.callId,
            content: message.content,
            is_error: message.isError,
          }],
        };
    }
  });
}

export function fromAnthropicMessage(response: Anthropic.Message): WorkerResponse {
  const text = response.content
    .flatMap(block => (block.type === 'text' ? [block.text] : []))
    .join('\n')
    .trim();

  for (const block of response.content) {
    if (block.type === 'tool_use') {
      const input = ToolInputSchema.safeParse(block.input);
      return {
        type: 'tool_call',
        callId: block.id,
        toolName: block.name,
        arguments: input.success ? input.data : {},
        text: text || undefined,
      };
    }
  }

  return { type: 'answer', text };
}

export class AnthropicWorkerModel implements WorkerModel {
  private messages: MessagesApi;
  private options: AnthropicWorkerOptions;

  constructor(messages: MessagesApi, options: AnthropicWorkerOptions) {
    this.messages = messages;
    this.options = options;
  }

  async complete(request: WorkerRequest): Promise<WorkerResponse> {
    const tools = toAnthropicTools(request.availableTools);
    const response = await this.messages.create({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      temperature: this.options.temperature,
      system: request.systemPrompt,
      tools: tools.length > 0 ? tools : undefined,
      messages: toAnthropicMessages(request.conversationHistory),
    });
    return fromAnthropicMessage(response);
  }
}
