/**
 * Phase Type Resolver
 *
 * Maps a phase display name ("Backend Development") to the phase type whose
 * task template expands it ("backend"). Exact aliases are tried first, then
 * keywords in registry order. There is no fallback type.
 */

import type { Phase, PhaseTypeTemplate } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

export function resolvePhaseType(
  phase: Pick<Phase, 'id' | 'name'>,
  phaseTypes: readonly PhaseTypeTemplate[]
): PhaseTypeTemplate {
  const name = phase.name.trim().toLowerCase();

  const byAlias = phaseTypes.find((candidate) =>
    candidate.aliases.some((alias) => alias.toLowerCase() === name)
  );
  if (byAlias) return byAlias;

  const byKeyword = phaseTypes.find((candidate) =>
    candidate.keywords.some((keyword) => name.includes(keyword.toLowerCase()))
  );
  if (byKeyword) return byKeyword;

  throw new ConfigurationError(
    `No phase type matches phase '${phase.name}' (${phase.id})`,
    { phaseId: phase.id, phaseName: phase.name, knownTypes: phaseTypes.map((t) => t.phaseType) }
  );
}
