export type RoleType = 'UGC Creator' | 'Video Editor';

export const ROLE_TYPES: readonly RoleType[] = ['UGC Creator', 'Video Editor'];

export type RejectionKind =
  | 'InvalidEmail'
  | 'PlaceholderData'
  | 'NotAnIndividual'
  | 'InvalidProfileUrl'
  | 'DuplicateEmail';

export const REJECTION_KINDS: readonly RejectionKind[] = [
  'InvalidEmail',
  'PlaceholderData',
  'NotAnIndividual',
  'InvalidProfileUrl',
  'DuplicateEmail',
];

export type FetchFailureKind = 'FetchTimeout' | 'FetchError';

export type ExhaustionPolicy = 'skip' | 'synthesize';

export interface RoleSource {
  roleType: RoleType;
  listingUrl: string;
}

export interface HtmlProfileFragment {
  kind: 'html';
  roleType: RoleType;
  profileUrl: string;
  html: string;
}

export interface SyntheticProfileFragment {
  kind: 'synthetic';
  roleType: RoleType;
  profileUrl: string;
  name: string;
  email: string;
}

export type RawProfileFragment = HtmlProfileFragment | SyntheticProfileFragment;

export interface CandidateRecord {
  name: string;
  email: string;
  profile_link: string;
  role_type: RoleType;
  synthetic: boolean;
}

export interface AcceptedRecord {
  readonly name: string;
  readonly email: string;
  readonly profile_link: string;
  readonly role_type: RoleType;
}

export type ValidationOutcome =
  | { status: 'accepted'; record: AcceptedRecord }
  | { status: 'rejected'; reason: RejectionKind; detail: string };

export interface LoadedPage {
  url: string;
  html: string;
}
