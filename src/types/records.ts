/**
 * DevGate — Record Types
 *
 * Normalized shapes returned to gateway callers, one per source concept.
 * Field names follow the gateway's public wire format.
 */

// ============================================================
// SOURCE HOSTING
// ============================================================

export interface RepoRecord {
  id: number;
  name: string;
  url: string;
}

export interface IssueRecord {
  id: number;
  title: string;
  url: string;
}

export interface PullRequestRecord {
  id: number;
  title: string;
  url: string;
  user: string;
}

export interface ReleaseRecord {
  tag_name: string;
  name: string | null;
  url: string;
  published_at: string;
}

export interface PipelineRunRecord {
  project: string;
  pipeline_id: number;
  status: string;
  url: string;
}

// ============================================================
// PACKAGE REGISTRIES
// ============================================================

export interface NpmPackageRecord {
  name: string;
  description: string;
  latest_version: string;
  homepage: string | null;
}

export interface NpmSearchRecord {
  name: string;
  version: string;
  description: string;
  link: string | null;
}

export interface PypiPackageRecord {
  name: string;
  version: string;
  summary: string;
  author: string | null;
  home_page: string | null;
}

export interface LatestVersionRecord {
  package_name: string;
  latest_version: string;
}

// ============================================================
// NEWS & FORUMS
// ============================================================

export interface StoryRecord {
  id: number;
  title: string;
  url: string | null;
  points: number;
  author: string;
  type: string;
  time: number;
  comments: number;
}

export interface HnUserRecord {
  id: string;
  created: number;
  karma: number;
  about: string | null;
  submitted: number[];
}

export interface PostRecord {
  id: string;
  title: string;
  subreddit: string;
  url: string;
  author: string;
  score: number;
}

export interface ArticleRecord {
  id: number;
  title: string;
  url: string;
  author: string | null;
  tags: string;
}

// ============================================================
// Q&A
// ============================================================

export interface QuestionRecord {
  question_id: number;
  title: string;
  link: string;
}

export interface AnswerRecord {
  answer_id: number;
  question_id: number;
  link: string;
}

export interface FeaturedQuestionRecord {
  title: string;
  link: string;
  bounty_amount: number;
  answer_count: number;
  owner_display_name: string;
}

export interface SearchQuestionRecord extends QuestionRecord {
  owner: { display_name: string };
  tags: string[];
  score: number;
  is_answered: boolean;
}

// ============================================================
// COMPETITIVE PROGRAMMING & DATA
// ============================================================

export interface ContestRecord {
  id: number;
  name: string;
  phase: string;
  link: string;
}

export interface UserProfileRecord {
  handle: string;
  firstName: string | null;
  lastName: string | null;
  country: string | null;
  organization: string | null;
  rating: number | null;
  maxRating: number | null;
  rank: string | null;
  maxRank: string | null;
  /** UTC, `YYYY-MM-DD HH:mm:ss` */
  lastOnline: string | null;
  profileLink: string;
}

export interface ProblemOfTheDayRecord {
  title: string;
  link: string;
}

export interface SolveStatsRecord {
  totalSolved: number | null;
  easy: number | null;
  medium: number | null;
  hard: number | null;
}

export interface DatasetRecord {
  title: string;
  ref: string;
  url: string;
}

export interface CompetitionRecord {
  ref: string;
  title: string;
  deadline: string;
}

// ============================================================
// GATEWAY
// ============================================================

export interface FeatureEntry {
  example_endpoint: string;
  description: string;
}

export type FeatureMap = Record<string, FeatureEntry>;
