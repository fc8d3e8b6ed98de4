import { z } from 'zod';
import { EvaluationError, type EventDescriptor } from '../../engine';

/**
 * GitHub / GitLab style webhook payloads, reduced to the fields a build
 * event needs. Unknown fields pass through untouched.
 */
const text = z.string().min(1);

const repositoryFields = z
  .object({
    repo: text.optional(),
    // GitHub: repository.full_name (owner/repo) or repository.clone_url
    repository: z
      .object({ full_name: text.optional(), clone_url: text.optional() })
      .passthrough()
      .optional(),
    // GitLab: project.path_with_namespace or project.web_url
    project: z
      .object({ path_with_namespace: text.optional(), web_url: text.optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

const githubPullRequest = z
  .object({
    number: z.number().int(),
    pull_request: z
      .object({
        title: z.string().optional(),
        head: z.object({ sha: z.string() }).passthrough(),
        base: z.object({ ref: text }).passthrough(),
      })
      .passthrough(),
    sender: z.object({ login: z.string() }).passthrough().optional(),
  })
  .passthrough();

const gitlabMergeRequest = z
  .object({
    object_kind: z.literal('merge_request'),
    object_attributes: z
      .object({
        iid: z.number().int(),
        title: z.string().optional(),
        target_branch: text,
        last_commit: z.object({ id: z.string() }).passthrough().optional(),
      })
      .passthrough(),
    user: z.object({ username: z.string() }).passthrough().optional(),
  })
  .passthrough();

const commitFields = z.object({ message: z.string().optional() }).passthrough();

const pushPayload = z
  .object({
    ref: text.optional(),
    branch: text.optional(),
    // GitHub: after; GitLab: checkout_sha; plain payloads: commit
    after: z.string().optional(),
    checkout_sha: z.string().nullish(),
    commit: z.string().optional(),
    head_commit: commitFields.nullish(),
    commits: z.array(commitFields).optional(),
    message: z.string().optional(),
    sender: z.object({ login: z.string() }).passthrough().optional(),
    user_username: z.string().optional(),
    author: z.string().optional(),
  })
  .passthrough();

/**
 * Repository identifier of a webhook payload, or null when it carries none.
 */
export function getRepoFromPayload(body: unknown): string | null {
  const parsed = repositoryFields.safeParse(body);
  if (!parsed.success) return null;
  const { repo, repository, project } = parsed.data;
  return (
    repo ??
    repository?.full_name ??
    repository?.clone_url ??
    project?.path_with_namespace ??
    project?.web_url ??
    null
  );
}

/**
 * Build event for a webhook payload: pull/merge requests by their head ref
 * with the target branch as branch, pushes by ref (refs/tags/* become tag
 * events). Throws EvaluationError when the payload names no ref at all.
 */
export function toEventDescriptor(body: unknown): EventDescriptor {
  const pr = githubPullRequest.safeParse(body);
  if (pr.success) {
    const { number, pull_request: pull, sender } = pr.data;
    return {
      type: 'pull_request',
      ref: `refs/pull/${number}/head`,
      branch: pull.base.ref,
      commit: pull.head.sha,
      message: pull.title,
      actor: sender?.login,
    };
  }

  const mr = gitlabMergeRequest.safeParse(body);
  if (mr.success) {
    const { object_attributes: attrs, user } = mr.data;
    return {
      type: 'pull_request',
      ref: `refs/merge-requests/${attrs.iid}/head`,
      branch: attrs.target_branch,
      commit: attrs.last_commit?.id,
      message: attrs.title,
      actor: user?.username,
    };
  }

  const push = pushPayload.safeParse(body);
  if (push.success) {
    const data = push.data;
    const ref = data.ref ?? (data.branch ? `refs/heads/${data.branch}` : undefined);
    if (ref) {
      const lastCommit = data.commits?.[data.commits.length - 1];
      return {
        type: ref.startsWith('refs/tags/') ? 'tag' : 'push',
        ref,
        commit: data.after ?? data.checkout_sha ?? data.commit,
        message: data.head_commit?.message ?? lastCommit?.message ?? data.message,
        actor: data.sender?.login ?? data.user_username ?? data.author,
      };
    }
  }

  throw new EvaluationError('Webhook payload carries no ref, branch or pull request');
}
