/**
 * DevGate — GitLab Adapter
 *
 * Projects, assigned issues and recent pipelines for the token owner.
 * Works against gitlab.com or a self-managed instance (GITLAB_URL).
 */

import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { requireSetting } from '../lib/errors';
import { fanOut } from '../lib/fanout';
import { parseEach, parsePayload, take, unknownList } from '../lib/shape';
import type { IssueRecord, PipelineRunRecord, RepoRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const PAGE_SIZE = 10;
const PIPELINE_PROJECTS = 3;
const PIPELINES_PER_PROJECT = 3;

const ProjectSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  web_url: z.string(),
});

const IssueSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  web_url: z.string(),
});

const PipelineSchema = z.object({
  id: z.number().int(),
  status: z.string(),
  web_url: z.string(),
});

type Project = z.output<typeof ProjectSchema>;

export class GitLabAdapter extends SourceAdapter {
  readonly prefix = 'gitlab';
  readonly description = 'List your GitLab projects, issues and pipelines';
  readonly exampleEndpoint = '/gitlab/projects';

  private readonly apiBase: string;

  constructor(config: GatewayConfig) {
    super(config, 'GitLab');
    this.apiBase = `${config.gitlab.baseUrl}/api/v4`;
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/projects', 'Most recently created owned projects', () => this.projects()),
      this.get('/issues', 'Issues assigned to the user', () => this.issues()),
      this.get('/pipelines', 'Recent pipelines of the most active projects', () => this.pipelines()),
    ];
  }

  async projects(): Promise<RepoRecord[]> {
    const projects = await this.listProjects('created_at', PAGE_SIZE, 'Failed to fetch GitLab projects');
    return projects.map(project => ({ id: project.id, name: project.name, url: project.web_url }));
  }

  async issues(): Promise<IssueRecord[]> {
    const payload = await this.http.getJson(`${this.apiBase}/issues`, {
      headers: this.headers(),
      query: { scope: 'assigned_to_me', order_by: 'created_at', sort: 'desc', per_page: PAGE_SIZE },
      errorMessage: 'Failed to fetch GitLab issues',
    });
    const issues = parseEach(IssueSchema, parsePayload(unknownList, payload, this.label), this.label);
    return take(issues, PAGE_SIZE).map(issue => ({
      id: issue.id,
      title: issue.title,
      url: issue.web_url,
    }));
  }

  /**
   * Most active projects first, then their latest pipelines concurrently.
   * A project whose pipelines cannot be read contributes nothing.
   */
  async pipelines(): Promise<PipelineRunRecord[]> {
    const projects = await this.listProjects(
      'last_activity_at',
      PIPELINE_PROJECTS,
      'Failed to fetch initial projects for pipelines'
    );

    const outcome = await fanOut(projects, project => this.projectPipelines(project), {
      label: 'gitlab.pipelines',
      logger: this.logger,
    });

    return outcome.values.flat();
  }

  private async projectPipelines(project: Project): Promise<PipelineRunRecord[]> {
    const payload = await this.http.getJson(`${this.apiBase}/projects/${project.id}/pipelines`, {
      headers: this.headers(),
      query: { per_page: PIPELINES_PER_PROJECT },
      errorMessage: `Failed to fetch pipelines for ${project.name}`,
    });
    const pipelines = parseEach(PipelineSchema, parsePayload(unknownList, payload, this.label), this.label);
    return take(pipelines, PIPELINES_PER_PROJECT).map(pipeline => ({
      project: project.name,
      pipeline_id: pipeline.id,
      status: pipeline.status,
      url: pipeline.web_url,
    }));
  }

  private async listProjects(orderBy: string, perPage: number, errorMessage: string): Promise<Project[]> {
    const payload = await this.http.getJson(`${this.apiBase}/projects`, {
      headers: this.headers(),
      query: { owned: 'true', order_by: orderBy, sort: 'desc', per_page: perPage },
      errorMessage,
    });
    const projects = parseEach(ProjectSchema, parsePayload(unknownList, payload, this.label), this.label);
    return take(projects, perPage);
  }

  private headers(): Record<string, string> {
    return { 'PRIVATE-TOKEN': requireSetting(this.config.gitlab.token, 'GITLAB_TOKEN') };
  }
}
