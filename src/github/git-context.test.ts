import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseRepoFromRemoteUrl } from './git-context.js';

void describe('parseRepoFromRemoteUrl', async () => {
  await it('reads HTTPS remotes', () => {
    assert.strictEqual(parseRepoFromRemoteUrl('https://github.com/octo/widgets.git'), 'octo/widgets');
    assert.strictEqual(parseRepoFromRemoteUrl('https://github.com/octo/widgets'), 'octo/widgets');
    assert.strictEqual(parseRepoFromRemoteUrl('https://ci@github.com/octo/widgets.git\n'), 'octo/widgets');
  });

  await it('reads SSH remotes', () => {
    assert.strictEqual(parseRepoFromRemoteUrl('git@github.com:octo/widgets.git'), 'octo/widgets');
    assert.strictEqual(parseRepoFromRemoteUrl('ssh://git@github.com/octo/widgets/'), 'octo/widgets');
  });

  await it('keeps dots inside repository names', () => {
    assert.strictEqual(parseRepoFromRemoteUrl('git@github.com:octo/widgets.js.git'), 'octo/widgets.js');
  });

  await it('returns null for other hosts and shapes', () => {
    assert.strictEqual(parseRepoFromRemoteUrl('https://gitlab.com/octo/widgets.git'), null);
    assert.strictEqual(parseRepoFromRemoteUrl('https://github.com/octo'), null);
    assert.strictEqual(parseRepoFromRemoteUrl(''), null);
  });
});
