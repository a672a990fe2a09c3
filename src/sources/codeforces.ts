/**
 * DevGate — Codeforces Adapter
 *
 * Upcoming contests and user profiles from the public Codeforces API.
 * The API wraps every payload in `{ status, result }` and answers an
 * unknown handle with HTTP 400.
 */

import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { NotFoundError, requireSetting } from '../lib/errors';
import { numberOr, parseEach, parsePayload, stringOr, take, unknownList } from '../lib/shape';
import type { ContestRecord, UserProfileRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const CODEFORCES_API = 'https://codeforces.com/api';
const CODEFORCES_WEB = 'https://codeforces.com';

const MAX_CONTESTS = 10;
const UPCOMING_PHASE = 'BEFORE';

const EnvelopeSchema = z.object({
  result: unknownList,
});

const PhaseSchema = z.object({ phase: z.string() });

const ContestSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  phase: z.string(),
});

const UserSchema = z.object({
  handle: z.string(),
  firstName: stringOr(null),
  lastName: stringOr(null),
  country: stringOr(null),
  organization: stringOr(null),
  rating: numberOr(null),
  maxRating: numberOr(null),
  rank: stringOr(null),
  maxRank: stringOr(null),
  lastOnlineTimeSeconds: numberOr(null),
});

/**
 * Epoch seconds → `YYYY-MM-DD HH:mm:ss` in UTC. Zero or absent → null.
 */
export function formatEpochSeconds(seconds: number | null): string | null {
  if (!seconds) return null;
  return new Date(seconds * 1000).toISOString().slice(0, 19).replace('T', ' ');
}

export class CodeforcesAdapter extends SourceAdapter {
  readonly prefix = 'codeforces';
  readonly description = 'Get upcoming Codeforces contests';
  readonly exampleEndpoint = '/codeforces/contests';

  constructor(config: GatewayConfig) {
    super(config, 'Codeforces');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/contests', 'Next upcoming contests', () => this.upcomingContests()),
      // Registered before /userinfo/:handle so "me" is not read as a handle
      this.get('/userinfo/me', 'Profile of the configured default handle', () => this.defaultUserInfo()),
      this.get('/userinfo/:handle', 'Profile of a handle', ({ params }) =>
        this.userInfo(params.handle, `Codeforces user '${params.handle}' not found.`)
      ),
    ];
  }

  async upcomingContests(): Promise<ContestRecord[]> {
    const payload = await this.http.getJson(`${CODEFORCES_API}/contest.list`, {
      errorMessage: 'Failed to fetch contests',
    });
    const { result } = parsePayload(EnvelopeSchema, payload, this.label);

    const upcoming = result.filter(item => {
      const parsed = PhaseSchema.safeParse(item);
      return parsed.success && parsed.data.phase === UPCOMING_PHASE;
    });

    return take(parseEach(ContestSchema, upcoming, this.label), MAX_CONTESTS).map(contest => ({
      id: contest.id,
      name: contest.name,
      phase: contest.phase,
      link: `${CODEFORCES_WEB}/contest/${contest.id}`,
    }));
  }

  async defaultUserInfo(): Promise<UserProfileRecord> {
    const handle = requireSetting(this.config.codeforces.defaultHandle, 'CODEFORCES_HANDLE');
    return this.userInfo(handle, `Default Codeforces user '${handle}' not found.`);
  }

  async userInfo(handle: string, notFoundMessage: string): Promise<UserProfileRecord> {
    const payload = await this.http.getJson(`${CODEFORCES_API}/user.info`, {
      query: { handles: handle },
      errorMessage: `Failed to fetch Codeforces user '${handle}'`,
      notFound: { message: notFoundMessage, statuses: [400, 404] },
    });
    const { result } = parsePayload(EnvelopeSchema, payload, this.label);

    if (result.length === 0) {
      throw new NotFoundError(notFoundMessage);
    }

    const user = parsePayload(UserSchema, result[0], this.label);

    return {
      handle: user.handle,
      firstName: user.firstName,
      lastName: user.lastName,
      country: user.country,
      organization: user.organization,
      rating: user.rating,
      maxRating: user.maxRating,
      rank: user.rank,
      maxRank: user.maxRank,
      lastOnline: formatEpochSeconds(user.lastOnlineTimeSeconds),
      profileLink: `${CODEFORCES_WEB}/profile/${user.handle}`,
    };
  }
}
