import type { NextFunction, Request, Response, Router } from "express";
import { promptPreviewRequestSchema, type PromptPreviewResponse } from "@docsum/shared";
import { buildSummarizationPrompt } from "../prompts/promptBuilder.js";

export function mountPromptRoute(router: Router): void {
  router.post("/prompt", (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = promptPreviewRequestSchema.parse(req.body);
      const body: PromptPreviewResponse = {
        prompt: buildSummarizationPrompt({ docText: input.text, ...input.options }),
        inputChars: Array.from(input.text).length
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });
}
