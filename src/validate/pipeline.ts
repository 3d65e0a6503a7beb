import type { ProfileUrlRule } from '../config.js';
import type { CandidateRecord, RejectionKind, ValidationOutcome } from '../types.js';
import { normalizeWhitespace } from '../utils/text.js';
import type { QualityMarkers } from './markers.js';
import {
  findOrganizationMarker,
  findPlaceholderMarker,
  isValidEmailFormat,
  isValidProfileUrl,
  normalizeEmail,
} from './rules.js';
import type { SeenEmailSet } from './seenEmails.js';

interface StageInput {
  candidate: CandidateRecord;
  email: string;
  name: string;
}

interface Stage {
  kind: RejectionKind;
  // Returns a rejection detail, or null when the stage passes.
  check(input: StageInput): string | null;
}

/**
 * Five-stage quality gate. Stages run in declaration order and stop at the first failure,
 * so the reported reason is always the earliest failing stage. The duplicate stage is last
 * because it is the only one that mutates state: a record rejected earlier never reaches
 * the seen-email set.
 */
export class ProfileValidator {
  private readonly stages: readonly Stage[];

  constructor(
    markers: QualityMarkers,
    urlRule: ProfileUrlRule,
    private readonly seen: SeenEmailSet,
  ) {
    this.stages = [
      {
        kind: 'InvalidEmail',
        check: ({ email }) => {
          if (!email) {
            return 'email missing';
          }
          return isValidEmailFormat(email) ? null : `malformed email "${email}"`;
        },
      },
      {
        kind: 'PlaceholderData',
        check: ({ candidate, email, name }) =>
          candidate.synthetic ? 'synthetic record' : findPlaceholderMarker(email, name, markers.PlaceholderData),
      },
      {
        kind: 'NotAnIndividual',
        check: ({ name }) => findOrganizationMarker(name, markers.NotAnIndividual),
      },
      {
        kind: 'InvalidProfileUrl',
        check: ({ candidate }) =>
          isValidProfileUrl(candidate.profile_link, urlRule)
            ? null
            : `profile link "${candidate.profile_link}" is not under https://${urlRule.host}${urlRule.pathPrefix}`,
      },
      {
        kind: 'DuplicateEmail',
        check: ({ email }) => (this.seen.claim(email) ? null : `email ${email} already accepted`),
      },
    ];
  }

  validate(candidate: CandidateRecord): ValidationOutcome {
    const input: StageInput = {
      candidate,
      email: normalizeEmail(candidate.email),
      name: normalizeWhitespace(candidate.name),
    };

    for (const stage of this.stages) {
      const detail = stage.check(input);
      if (detail !== null) {
        return { status: 'rejected', reason: stage.kind, detail };
      }
    }

    return {
      status: 'accepted',
      record: Object.freeze({
        name: input.name,
        email: input.email,
        profile_link: candidate.profile_link.trim(),
        role_type: candidate.role_type,
      }),
    };
  }
}
