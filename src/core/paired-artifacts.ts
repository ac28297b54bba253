import { CheckContext, CheckResult, FindingCode, FindingLevel, PairedArtifactResource } from '../types';
import { ALIGNMENT_FIELDS, INDICATOR_FIELDS, PHASE_VECTOR_LENGTH } from '../config/pipeline-layout';
import { createFinding } from './findings';
import { checkPresence, parseFailure, parseJsonDocument, resolvePath } from './schema-validator';

export interface PairedSchemaEvaluation {
  /** Length of phase_vector, or null when it is not an array */
  vectorLength: number | null;
  vectorOk: boolean;
  alignmentOk: boolean;
  indicatorsOk: boolean;
}

/**
 * Evaluate the three independent sub-conditions of an agent document
 */
export function evaluatePrimary(doc: unknown): PairedSchemaEvaluation {
  const vector = resolvePath(doc, 'phase_vector').value;
  const vectorLength = Array.isArray(vector) ? vector.length : null;

  const alignment = resolvePath(doc, 'tf_alignment').value;
  const indicators = resolvePath(doc, 'indicators').value;

  return {
    vectorLength,
    vectorOk: vectorLength === PHASE_VECTOR_LENGTH,
    alignmentOk: checkPresence(alignment, ALIGNMENT_FIELDS).every((p) => p.present),
    indicatorsOk: checkPresence(indicators, INDICATOR_FIELDS).every((p) => p.present),
  };
}

/**
 * Validate one instrument's A/B agent pair.
 * An incomplete but present pair degrades the pipeline; it never breaks it,
 * so nothing here is ERROR.
 */
export async function checkPairedArtifact(
  resource: PairedArtifactResource,
  ctx: CheckContext
): Promise<CheckResult> {
  const now = ctx.now();
  const [primary, secondary] = await Promise.all([
    ctx.fs.stat(resource.locator),
    ctx.fs.stat(resource.secondaryLocator),
  ]);

  if (!primary || !secondary) {
    return {
      findings: [
        createFinding(FindingLevel.Warn, resource.id, 'missing A or B', now, {
          code: FindingCode.MissingResource,
          details: { primaryExists: primary !== null, secondaryExists: secondary !== null },
        }),
      ],
    };
  }

  const parsed = parseJsonDocument(await ctx.fs.readText(resource.locator));
  if (!parsed.ok) {
    return { findings: [parseFailure(resource.id, parsed.error, now)] };
  }

  const evaluation = evaluatePrimary(parsed.value);
  const details = {
    vectorLength: evaluation.vectorLength,
    alignmentOk: evaluation.alignmentOk,
    indicatorsOk: evaluation.indicatorsOk,
  };
  const summary =
    `vector_len=${evaluation.vectorLength ?? 'n/a'} ` +
    `alignment=${evaluation.alignmentOk} indicators=${evaluation.indicatorsOk}`;

  if (evaluation.vectorOk && evaluation.alignmentOk && evaluation.indicatorsOk) {
    return {
      findings: [createFinding(FindingLevel.OK, resource.id, `pair ok (${summary})`, now, { details })],
    };
  }
  return {
    findings: [
      createFinding(FindingLevel.Warn, resource.id, `schema incomplete (${summary})`, now, {
        code: FindingCode.InvalidSchema,
        details,
      }),
    ],
  };
}
