/**
 * DevGate — npm Adapter
 *
 * Package documents and search results from the public npm registry.
 * Search lives under `/-/search` so it can never shadow a package name.
 */

import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { parseEach, parsePayload, stringOr, take, unknownListOr } from '../lib/shape';
import type { LatestVersionRecord, NpmPackageRecord, NpmSearchRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const NPM_REGISTRY = 'https://registry.npmjs.org';

const MAX_SEARCH_RESULTS = 10;

const PackageDocumentSchema = z.object({
  name: z.string().optional(),
  description: stringOr(''),
  homepage: stringOr(null),
  'dist-tags': z
    .object({ latest: stringOr('0.0.0') })
    .nullish()
    .transform(tags => tags?.latest ?? '0.0.0'),
});

const SearchSchema = z.object({
  objects: unknownListOr(),
});

const SearchObjectSchema = z.object({
  package: z.object({
    name: z.string(),
    version: z.string(),
    description: stringOr(''),
    links: z
      .object({ npm: stringOr(null) })
      .nullish()
      .transform(links => links?.npm ?? null),
  }),
});

const SearchQuerySchema = z.object({
  text: z.string().min(1),
});

/** `@scope/name` keeps its `@` but the slash must be escaped. */
export function registryPath(packageName: string): string {
  if (packageName.startsWith('@')) {
    return `@${encodeURIComponent(packageName.slice(1))}`;
  }
  return encodeURIComponent(packageName);
}

export class NpmAdapter extends SourceAdapter {
  readonly prefix = 'npm';
  readonly description = 'Look up and search packages on npm';
  readonly exampleEndpoint = '/npm/-/search?text=react';

  constructor(config: GatewayConfig) {
    super(config, 'npm');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/-/search', 'Search packages', ({ query }) => {
        const { text } = this.validate(SearchQuerySchema, query);
        return this.search(text);
      }),
      this.get('/:packageName', 'Package details', ({ params }) => this.details(params.packageName)),
      this.get('/:packageName/latest', 'Latest published version', ({ params }) =>
        this.latest(params.packageName)
      ),
    ];
  }

  async details(packageName: string): Promise<NpmPackageRecord> {
    const doc = await this.fetchDocument(packageName, 'Error fetching npm package');
    return {
      name: doc.name ?? packageName,
      description: doc.description,
      latest_version: doc['dist-tags'],
      homepage: doc.homepage,
    };
  }

  async latest(packageName: string): Promise<LatestVersionRecord> {
    const doc = await this.fetchDocument(packageName, 'Error fetching npm version');
    return {
      package_name: doc.name ?? packageName,
      latest_version: doc['dist-tags'],
    };
  }

  async search(text: string): Promise<NpmSearchRecord[]> {
    const payload = await this.http.getJson(`${NPM_REGISTRY}/-/v1/search`, {
      query: { text, size: MAX_SEARCH_RESULTS },
      errorMessage: 'Error searching npm',
    });
    const { objects } = parsePayload(SearchSchema, payload, this.label);

    return take(parseEach(SearchObjectSchema, objects, this.label), MAX_SEARCH_RESULTS).map(
      ({ package: pkg }) => ({
        name: pkg.name,
        version: pkg.version,
        description: pkg.description,
        link: pkg.links,
      })
    );
  }

  private async fetchDocument(packageName: string, errorMessage: string) {
    const payload = await this.http.getJson(`${NPM_REGISTRY}/${registryPath(packageName)}`, {
      errorMessage,
      notFound: { message: `Package '${packageName}' not found on npm.` },
    });
    return parsePayload(PackageDocumentSchema, payload, this.label);
  }
}
