/**
 * DevGate — Type Exports
 */

export type {
  RepoRecord,
  IssueRecord,
  PullRequestRecord,
  ReleaseRecord,
  PipelineRunRecord,
  NpmPackageRecord,
  NpmSearchRecord,
  PypiPackageRecord,
  LatestVersionRecord,
  StoryRecord,
  HnUserRecord,
  PostRecord,
  ArticleRecord,
  QuestionRecord,
  AnswerRecord,
  FeaturedQuestionRecord,
  SearchQuestionRecord,
  ContestRecord,
  UserProfileRecord,
  ProblemOfTheDayRecord,
  SolveStatsRecord,
  DatasetRecord,
  CompetitionRecord,
  FeatureEntry,
  FeatureMap,
} from './records';
