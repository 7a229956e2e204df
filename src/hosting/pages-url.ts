import type { GitClient } from '../git/git-client.js';
import type { Prompter } from '../cli/prompter.js';
import { logger } from '../utils/logger.js';

const SSH_PREFIX = 'git@github.com:';

export const PAGES_URL_QUESTION = 'GitHub Pages URL (format: https://username.github.io/repo): ';

/**
 * Rewrites a GitHub remote into its Pages address: drop `.git`, turn the SSH
 * prefix into `https://`, then swap `github.com` for `github.io`.
 * Remotes that never named github.com are not recognised.
 */
export function derivePagesUrl(remoteUrl: string): string | null {
  let url = remoteUrl.trim();
  if (!url.includes('github.com')) return null;

  if (url.endsWith('.git')) url = url.slice(0, -'.git'.length);
  if (url.startsWith(SSH_PREFIX)) url = `https://${url.slice(SSH_PREFIX.length)}`;
  return url.replace('github.com', 'github.io');
}

export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}

export async function resolvePagesBaseUrl(
  git: Pick<GitClient, 'getRemoteUrl'>,
  prompter: Prompter,
  override?: string,
): Promise<string> {
  if (override) return normalizeBaseUrl(override);

  const remote = await git.getRemoteUrl();
  const derived = remote ? derivePagesUrl(remote) : null;
  if (derived) {
    logger.info({ remote, pagesUrl: derived }, 'Derived pages URL from origin remote');
    return normalizeBaseUrl(derived);
  }

  logger.debug({ remote }, 'Remote not recognised, asking for pages URL');
  const answer = normalizeBaseUrl(await prompter.ask(PAGES_URL_QUESTION));
  if (!answer) throw new Error('a GitHub Pages URL is required');
  return answer;
}
