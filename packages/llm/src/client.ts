// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm/client`
 * Purpose: Shared LLM client: YAML prompts, LangChain chat models behind LiteLLM, optional Langfuse tracing.
 * Scope: Render prompt -> invoke model -> normalize to string. Does not retry, parse JSON, or persist output.
 * Invariants:
 *   - Prompts render as mustache templates (`{{ var }}`)
 *   - Default model is built lazily once and reused; overrides build a fresh model per call
 *   - Every result goes through normalizeResult
 *   - Invocation errors are logged and rethrown unchanged
 *   - Tracing failures never change the result; an unavailable span means an untraced call
 *   - flush() is fire-and-forget on the request path
 * Side-effects: IO (LLM proxy, Langfuse, filesystem via PromptLoader)
 * Links: src/prompts.ts, src/model-factory.ts, src/tracing/, src/normalize/
 * @public
 */

import { sharedEnv } from "@phoenix/config";
import { getLogger, type Logger } from "@phoenix/observability";
import { utcTimestamp } from "@phoenix/utils";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { PromptTemplate } from "@langchain/core/prompts";

import { type LlmConfig, parseLlmConfig } from "./config";
import {
  type ChatModelFactory,
  connectionFromEnv,
  createChatModel,
} from "./model-factory";
import { normalizeResult } from "./normalize/normalize-result";
import type { PromptLoader } from "./prompts";
import { resolveTracer } from "./tracing/resolve-tracer";
import type { LlmTracer, TraceSpan } from "./tracing/tracer.port";

export type PromptContext = Record<string, unknown>;

export interface LlmClientOptions {
  /** Defaults to a ChatOpenAI pointed at LITELLM_BASE_URL. */
  modelFactory?: ChatModelFactory;
  /** Defaults to resolveTracer(sharedEnv()); pass `false` to disable tracing. */
  tracer?: LlmTracer | false;
  logger?: Logger;
}

export class LlmClient {
  private readonly modelFactory: ChatModelFactory;
  private readonly log: Logger;
  private defaultModel: BaseChatModel | undefined;
  private tracer: LlmTracer | undefined;
  private tracerResolved: boolean;

  constructor(
    readonly promptLoader: PromptLoader,
    private readonly defaultLlmConfig: LlmConfig,
    options: LlmClientOptions = {}
  ) {
    this.modelFactory =
      options.modelFactory ??
      ((config) => createChatModel(config, connectionFromEnv(sharedEnv())));
    this.log = options.logger ?? getLogger("llm.client");
    this.tracer = options.tracer === false ? undefined : options.tracer;
    this.tracerResolved = options.tracer !== undefined;
  }

  static normalizeResult(result: unknown): string {
    return normalizeResult(result);
  }

  /** Render a prompt without invoking a model. */
  async renderPrompt(promptName: string, context: PromptContext): Promise<string> {
    const prompt = await this.loadPrompt(promptName);
    return prompt.format(context);
  }

  /**
   * Render `promptName` with `context` and return the model's normalized text.
   * `model` overrides the default: a LiteLLM model id, or a full LlmConfig.
   */
  async generate(
    promptName: string,
    context: PromptContext,
    model?: string | LlmConfig
  ): Promise<string> {
    const prompt = await this.loadPrompt(promptName);
    const chatModel =
      model === undefined
        ? this.getDefaultModel()
        : this.modelFactory(
            typeof model === "string" ? parseLlmConfig({ model }) : model
          );

    return this.run("llm.generate", prompt, chatModel, promptName, context);
  }

  /** Same as generate() with the default model, for callers parsing the text into structured data. */
  async generateStructured(promptName: string, context: PromptContext): Promise<string> {
    const prompt = await this.loadPrompt(promptName);
    return this.run(
      "llm.generate_structured",
      prompt,
      this.getDefaultModel(),
      promptName,
      context
    );
  }

  private async loadPrompt(promptName: string): Promise<PromptTemplate<PromptContext>> {
    const templateText = await this.promptLoader.load(promptName);
    return PromptTemplate.fromTemplate<PromptContext>(templateText, {
      templateFormat: "mustache",
    });
  }

  private getDefaultModel(): BaseChatModel {
    if (!this.defaultModel) {
      this.defaultModel = this.modelFactory(this.defaultLlmConfig);
    }
    return this.defaultModel;
  }

  private getTracer(): LlmTracer | undefined {
    if (!this.tracerResolved) {
      this.tracer = resolveTracer(sharedEnv());
      this.tracerResolved = true;
    }
    return this.tracer;
  }

  private async run(
    event: string,
    prompt: PromptTemplate<PromptContext>,
    chatModel: BaseChatModel,
    promptName: string,
    context: PromptContext
  ): Promise<string> {
    const requestId = context.request_id ?? utcTimestamp();
    this.log.info({ prompt: promptName, request_id: requestId }, event);

    try {
      return await this.invokeWithTracing(prompt, chatModel, promptName, context);
    } catch (error) {
      this.log.error({ prompt: promptName, err: error }, `${event}.error`);
      throw error;
    }
  }

  private async invokeWithTracing(
    prompt: PromptTemplate<PromptContext>,
    chatModel: BaseChatModel,
    promptName: string,
    context: PromptContext
  ): Promise<string> {
    const chain = prompt.pipe(chatModel);
    const tracer = this.getTracer();
    if (!tracer) {
      return normalizeResult(await chain.invoke(context));
    }

    let span: TraceSpan | undefined;
    try {
      span = tracer.startSpan({ name: promptName, input: context });
    } catch (error) {
      this.log.debug({ err: error, prompt: promptName }, "langfuse.span.creation.failed");
    }

    try {
      const normalized = normalizeResult(await chain.invoke(context));
      this.endSpan(span, { content: normalized });
      return normalized;
    } catch (error) {
      this.endSpan(span, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.flushTracer(tracer);
    }
  }

  private endSpan(span: TraceSpan | undefined, output: Record<string, string>): void {
    if (!span) return;
    try {
      span.end(output);
    } catch (error) {
      this.log.debug({ err: error }, "langfuse.span.update.failed");
    }
  }

  private flushTracer(tracer: LlmTracer): void {
    const onFailure = (error: unknown): void => {
      this.log.debug({ err: error }, "langfuse.flush.failed");
    };
    try {
      void tracer.flush().catch(onFailure);
    } catch (error) {
      onFailure(error);
    }
  }
}
