import type { NextFunction, Request, Response, Router } from "express";
import { summarizeRequestSchema, type SummarizeResponse } from "@docsum/shared";
import { DEFAULT_TEMPERATURE } from "../llm/LLMClient.js";
import type { Logger } from "../logger.js";
import { requestIdOf } from "../middleware/requestId.js";
import { buildSummarizationPrompt, maxTokensForLength } from "../prompts/promptBuilder.js";
import type { ProviderFactory } from "../providers/index.js";

export function mountSummarizeRoute(router: Router, providers: ProviderFactory, logger: Logger): void {
  router.post("/summarize", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = summarizeRequestSchema.parse(req.body);
      const options = input.options ?? {};
      const prompt = buildSummarizationPrompt({ docText: input.text, ...options });
      const maxTokens = maxTokensForLength(options.length);
      const requestId = requestIdOf(res);

      const provider = providers.create(input.connection);
      const startedAt = Date.now();
      const summary = await provider.summarize(prompt, DEFAULT_TEMPERATURE, maxTokens);
      logger.info(
        { requestId, provider: provider.name, durationMs: Date.now() - startedAt, summaryChars: summary.length },
        "Summary generated"
      );

      const body: SummarizeResponse = {
        summary,
        ...(input.previewPrompt ? { prompt } : {}),
        usage: {
          provider: provider.name,
          requestId,
          inputChars: Array.from(input.text).length,
          maxTokens
        }
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });
}
