/**
 * DevGate — PyPI Adapter
 */

import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { parsePayload, stringOr } from '../lib/shape';
import type { LatestVersionRecord, PypiPackageRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const PYPI_BASE = 'https://pypi.org/pypi';

const PackageSchema = z.object({
  info: z.object({
    name: stringOr('No Name'),
    version: stringOr('0.0.0'),
    summary: stringOr(''),
    author: stringOr(null),
    home_page: stringOr(null),
  }),
});

export class PypiAdapter extends SourceAdapter {
  readonly prefix = 'pypi';
  readonly description = 'Get details and the latest version of a PyPI package';
  readonly exampleEndpoint = '/pypi/requests';

  constructor(config: GatewayConfig) {
    super(config, 'PyPI');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/:packageName', 'Package details', ({ params }) => this.details(params.packageName)),
      this.get('/:packageName/latest', 'Latest released version', ({ params }) =>
        this.latest(params.packageName)
      ),
    ];
  }

  async details(packageName: string): Promise<PypiPackageRecord> {
    const info = await this.fetchInfo(packageName, 'Error fetching package details');
    return {
      name: info.name,
      version: info.version,
      summary: info.summary,
      author: info.author,
      home_page: info.home_page,
    };
  }

  async latest(packageName: string): Promise<LatestVersionRecord> {
    const info = await this.fetchInfo(packageName, 'Error fetching package version');
    return {
      package_name: info.name,
      latest_version: info.version,
    };
  }

  private async fetchInfo(packageName: string, errorMessage: string) {
    const payload = await this.http.getJson(`${PYPI_BASE}/${encodeURIComponent(packageName)}/json`, {
      errorMessage,
      notFound: { message: `Package '${packageName}' not found on PyPI.` },
    });
    return parsePayload(PackageSchema, payload, this.label).info;
  }
}
