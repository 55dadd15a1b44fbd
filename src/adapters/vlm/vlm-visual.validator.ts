// =============================================================================
// VlmVisualValidator: Signature, stamp and photo presence checks
// =============================================================================

import { generateObject } from "ai";
import { z } from "zod";
import type { ValidationInput, ValidatorPort } from "../../ports/validator.port.js";
import type { ValidatorDefinition } from "../../domain/catalog.schema.js";
import type { ValidationResult } from "../../domain/job.schema.js";
import { errorMessage } from "../../errors.js";
import { failResult, passResult } from "../validation/result.js";
import { callSettings, type VlmAdapterOptions } from "./models.js";
import { buildPageContent } from "./pages.js";

export const VisualCheckSchema = z.object({
  present: z.boolean(),
  confidence: z.number().min(0).max(1),
  location: z.string().describe("Where the element appears, empty if absent"),
  details: z.string(),
});

const SYSTEM_PROMPT =
  "You are a document visual validation agent. Examine document images and verify the " +
  "presence of requested visual elements. Report whether the element is present, your " +
  "confidence level and its location.";

export class VlmVisualValidator implements ValidatorPort {
  readonly validatorType = "visual" as const;

  constructor(private readonly options: VlmAdapterOptions) {}

  async validate(definition: ValidatorDefinition, input: ValidationInput): Promise<ValidationResult> {
    if (input.pages.length === 0) {
      return failResult(definition, "No page images available for visual validation");
    }

    const check = definition.visualPrompt || definition.description;
    const expected = definition.visualExpected || "present";
    const prompt =
      `Visual validation check: ${check}\n\n` +
      `Expected: ${expected}\n\n` +
      "Examine the document images and determine if the requested visual element is present.";

    try {
      const content = await buildPageContent(prompt, input.pages);
      const { object } = await generateObject({
        ...callSettings(this.options),
        schema: VisualCheckSchema,
        schemaName: "VisualCheck",
        system: SYSTEM_PROMPT,
        messages: [{ role: "user", content }],
      });

      const details = { confidence: object.confidence, location: object.location, details: object.details };
      if (object.present) {
        return passResult(definition, `Visual element found: ${object.location}`, { details });
      }
      return failResult(definition, `Visual element not found: ${check}`, { details });
    } catch (error) {
      return failResult(definition, `Visual validation error: ${errorMessage(error)}`);
    }
  }
}
