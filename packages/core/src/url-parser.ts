/**
 * URL helpers for GitHub remotes.
 */

/**
 * Repository name at the end of a remote URL or path, without `.git`.
 *
 * @example
 * repoNameFromUrl('git@github.com:octocat/hello.git') // => 'hello'
 * repoNameFromUrl('/srv/git/hello/') // => 'hello'
 */
export function repoNameFromUrl(url: string): string | null {
    const last = url.replace(/\/+$/, '').split(/[/:]/).pop();
    return last ? last.replace(/\.git$/, '') || null : null;
}

/**
 * Build the clone URL for a GitHub repository.
 * The SSH form needs credentials, so it is only used for the configured
 * user's own repositories.
 */
export function buildCloneUrl(owner: string, repo: string, useSsh: boolean): string {
    return useSsh
        ? `git@github.com:${owner}/${repo}.git`
        : `https://github.com/${owner}/${repo}.git`;
}

/**
 * Whether a remote URL points at a network host rather than a local path.
 */
export function isNetworkRemote(url: string): boolean {
    return ['http://', 'https://', 'git@', 'ssh://'].some((prefix) => url.startsWith(prefix));
}
