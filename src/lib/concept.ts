import { z } from "zod";
import { ConceptValidationError } from "@/lib/errors";
import type { Concept, StoryBeats } from "@/types/concept";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const storySchema = z.object({
  intro: optionalText,
  hookMoment: optionalText,
  development: optionalText,
  climax: optionalText,
  closing: optionalText,
});

/** Unknown keys are dropped; `null` counts as absent. */
export const conceptSchema = z.object({
  title: optionalText,
  story: storySchema.nullish().transform((value) => value ?? undefined),
  hashtags: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? undefined),
});

function compactStory(story: z.infer<typeof storySchema>): StoryBeats {
  const beats: StoryBeats = {};
  if (story.intro !== undefined) beats.intro = story.intro;
  if (story.hookMoment !== undefined) beats.hookMoment = story.hookMoment;
  if (story.development !== undefined) beats.development = story.development;
  if (story.climax !== undefined) beats.climax = story.climax;
  if (story.closing !== undefined) beats.closing = story.closing;
  return beats;
}

export function parseConcept(input: unknown): Concept {
  const parsed = conceptSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConceptValidationError(`invalid concept: ${issues.join("; ")}`, issues);
  }

  const { title, story, hashtags } = parsed.data;
  return {
    ...(title !== undefined ? { title } : {}),
    ...(story ? { story: compactStory(story) } : {}),
    ...(hashtags ? { hashtags } : {}),
  };
}
