import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { REPO_QUESTION, VIDEO_QUESTION, resolveVideoPath, runShare } from '../../src/cli/run.js';
import { PAGES_URL_QUESTION } from '../../src/hosting/pages-url.js';
import { VideoNotFoundError } from '../../src/utils/errors.js';
import { createFakeGit, createScriptedPrompter, makeTempDir, removeDir } from '../helpers/fake-git.js';

describe('runShare', () => {
  let tmp: string;
  let repo: string;
  let video: string;
  let printed: string[];
  const print = (line: string) => printed.push(line);

  beforeEach(() => {
    tmp = makeTempDir();
    repo = path.join(tmp, 'repo');
    video = path.join(tmp, 'clip.mp4');
    fs.writeFileSync(video, 'not really a video');
    printed = [];
  });

  afterEach(() => removeDir(tmp));

  it('should ask for the repository and video, then share', async () => {
    const git = createFakeGit({ remoteUrl: 'https://github.com/alice/clips.git' });
    const prompter = createScriptedPrompter([repo, `"${video}"`]);

    const result = await runShare({ prompter, print, runner: git.runner });

    expect(prompter.questions).toEqual([REPO_QUESTION, VIDEO_QUESTION]);
    expect(result.pageUrl).toMatch(/^https:\/\/github\.io\/alice\/clips\/pages\/\d{8}_\d{6}_clip\.html$/);
    expect(git.subcommands()).toEqual([
      'init',
      'lfs install',
      'config --get remote.origin.url',
      'add .',
      'commit -m Add video: clip.mp4',
    ]);
    expect(printed[0]).toBe('=== GitHub LFS video share ===\n');
    expect(printed).toContain(`URL:      ${result.pageUrl}`);
    expect(printed).toContain(`QR code:  ${result.qrPath}`);
    expect(printed).toContain('1. git push origin main');
  });

  it('should skip the repository prompt when a path is configured', async () => {
    const prompter = createScriptedPrompter([video]);

    await runShare({
      prompter,
      print,
      repoPath: repo,
      pagesBaseUrl: 'https://alice.github.io/clips',
      runner: createFakeGit().runner,
    });

    expect(prompter.questions).toEqual([VIDEO_QUESTION]);
  });

  it('should ask for the pages url when the remote is not on GitHub', async () => {
    const git = createFakeGit({ remoteUrl: 'https://gitlab.com/alice/clips.git' });
    const prompter = createScriptedPrompter([repo, video, 'https://alice.pages.example.test']);

    const result = await runShare({ prompter, print, runner: git.runner });

    expect(prompter.questions).toEqual([REPO_QUESTION, VIDEO_QUESTION, PAGES_URL_QUESTION]);
    expect(result.pageUrl.startsWith('https://alice.pages.example.test/pages/')).toBe(true);
  });

  it('should resolve a relative video path against the repository', async () => {
    fs.mkdirSync(path.join(repo, 'incoming'), { recursive: true });
    fs.writeFileSync(path.join(repo, 'incoming', 'match.mp4'), 'match footage');
    const prompter = createScriptedPrompter([repo, 'incoming/match.mp4']);

    const result = await runShare({
      prompter,
      print,
      pagesBaseUrl: 'https://alice.github.io/clips',
      runner: createFakeGit().runner,
    });

    expect(result.videoPath).toBe(path.join(repo, 'videos', 'match.mp4'));
    expect(fs.readFileSync(result.videoPath, 'utf-8')).toBe('match footage');
  });

  it('should stop before setup when the video does not exist', async () => {
    const git = createFakeGit({ remoteUrl: 'https://github.com/alice/clips.git' });
    const prompter = createScriptedPrompter([repo, path.join(tmp, 'missing.mp4')]);

    await expect(runShare({ prompter, print, runner: git.runner })).rejects.toThrow(VideoNotFoundError);
    expect(git.calls).toHaveLength(0);
    expect(fs.existsSync(repo)).toBe(false);
  });

  it('should require a repository path', async () => {
    const prompter = createScriptedPrompter(['  ']);
    await expect(runShare({ prompter, print, runner: createFakeGit().runner })).rejects.toThrow(
      'a repository path is required',
    );
  });
});

describe('resolveVideoPath', () => {
  it('should keep an absolute path', () => {
    const video = path.join(path.sep, 'media', 'clip.mp4');
    expect(resolveVideoPath(path.join(path.sep, 'srv', 'share'), video)).toBe(video);
  });

  it('should join a relative path onto the repository', () => {
    const repo = path.join(path.sep, 'srv', 'share');
    expect(resolveVideoPath(repo, 'raw/clip.mp4')).toBe(path.join(repo, 'raw', 'clip.mp4'));
  });

  it('should leave an empty answer empty', () => {
    expect(resolveVideoPath('/srv/share', '')).toBe('');
  });
});
