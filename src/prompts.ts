// Prompt text for the OpenAI-backed oracles. Every prompt asks for a single
// JSON object so responses can be parsed with response_format json_object.

export interface ChatPrompt {
  system: string;
  user: string;
}

export function buildCoveragePrompt(bulletText: string, fullAnswer: string): ChatPrompt {
  return {
    system: `You judge whether one point of a model answer has been addressed in a candidate's spoken answer to a technical interview question.

Classify the point as exactly one of:
- "covered": the idea is clearly or implicitly present, even in different wording.
- "partial": the idea is touched on but lacks clarity or completeness.
- "incomplete": the idea is missing or wrong.

The answer is a speech-to-text transcript. Be tolerant of spoken forms such as "O of n log n" for O(n log n), "n squared" for O(n^2) or "split into halves" for "divide recursively". Lines starting with [FOLLOW-UP] are questions the interviewer asked, not the candidate's words.

Respond with ONLY a JSON object: {"status": "covered" | "partial" | "incomplete"}`,
    user: `Point:
"${bulletText}"

Candidate's full answer so far:
"""${fullAnswer}"""`,
  };
}

export function buildBinaryCoveragePrompt(bulletText: string, fullAnswer: string): ChatPrompt {
  return {
    system: `You judge whether one point of a model answer has been addressed in a candidate's spoken answer.

Answer "covered" only if the idea is clearly present, in any wording; otherwise answer "uncovered". Lines starting with [FOLLOW-UP] are interviewer questions, not the candidate's words.

Respond with ONLY a JSON object: {"status": "covered" | "uncovered"}`,
    user: `Point:
"${bulletText}"

Candidate's full answer so far:
"""${fullAnswer}"""`,
  };
}

export function buildConfidencePrompt(text: string): ChatPrompt {
  return {
    system: `You analyze a transcript segment from a technical interview and decide how certain the speaker sounds.

Use exactly one of:
- "knows": the speaker answers with confidence.
- "uncertain": the speaker hedges, guesses or trails off.
- "does_not_know": the speaker admits not knowing or asks to move on.

Respond with ONLY a JSON object: {"state": "knows" | "uncertain" | "does_not_know"}`,
    user: `Transcript segment:
"""${text}"""`,
  };
}

export function buildClaimPrompt(text: string): ChatPrompt {
  return {
    system: `You extract the discrete factual claims a speaker makes in a transcript segment. Ignore filler, hedges and questions. Keep each claim short and self-contained.

Respond with ONLY a JSON object:
{"claims": [{"text": "<claim>", "entities": ["<entity>", ...], "predicate": "<verb phrase>"}]}
Return {"claims": []} when there is no claim.`,
    user: `Transcript segment:
"""${text}"""`,
  };
}

export function buildPhrasingPrompt(targetBulletText: string, uncoveredBulletTexts: string[]): ChatPrompt {
  const others = uncoveredBulletTexts
    .filter((text) => text !== targetBulletText)
    .map((text) => `- ${text}`)
    .join("\n");

  return {
    system: `You are an interviewer asking one short, natural follow-up question that nudges the candidate toward a point they have not yet made. Do not reveal the point itself or its answer. One sentence, at most 30 words.

Respond with ONLY a JSON object: {"question": "<follow-up question>"}`,
    user: `Point to elicit:
"${targetBulletText}"

Other points still missing (context only, do not ask about them):
${others.length > 0 ? others : "(none)"}`,
  };
}

export function buildDecompositionPrompt(questionText: string, modelAnswer: string): ChatPrompt {
  return {
    system: `You break a model answer into atomic, independently verifiable bullet points. Each bullet states exactly one idea in one short sentence. Do not add ideas that are not in the model answer.

Respond with ONLY a JSON object: {"bullets": ["<point>", ...]}`,
    user: `Question:
"${questionText}"

Model answer:
"""${modelAnswer}"""`,
  };
}
