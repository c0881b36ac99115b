import { describe, it, expect } from 'vitest';
import { loadToolsConfig } from '../../src/application/use-cases/load-tools-config.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { CONF_PATH, makeContext, makeTree } from '../helpers/tree-fixture.js';
import { InMemoryFileSystem } from '../helpers/in-memory-fs.js';

describe('loadToolsConfig', () => {
  it('exposes the workspace lists', () => {
    const config = expectOk(loadToolsConfig(makeContext(makeTree())), 'load');

    expect(config.goWorkspaces()).toEqual(['release/go']);
    expect(config.vdlWorkspaces()).toEqual(['release/go/src']);
  });

  it('defaults missing workspace lists to empty and keeps other fields', () => {
    const config = expectOk(
      loadToolsConfig(makeContext(makeTree({ 'test-groups': { go: ['vanadium-go-test'] } }))),
      'load'
    );

    expect(config.goWorkspaces()).toEqual([]);
    expect(config.vdlWorkspaces()).toEqual([]);
    expect(config.raw()['test-groups']).toEqual({ go: ['vanadium-go-test'] });
  });

  it('treats null workspace lists as empty', () => {
    const config = expectOk(
      loadToolsConfig(makeContext(makeTree({ 'go-workspaces': null, 'vdl-workspaces': ['release/go/src'] }))),
      'null list'
    );

    expect(config.goWorkspaces()).toEqual([]);
    expect(config.vdlWorkspaces()).toEqual(['release/go/src']);
  });

  it('fails with IOError when conf.json cannot be read', () => {
    const fs = new InMemoryFileSystem().addDir('/v23');
    const error = expectErr(loadToolsConfig(makeContext(fs)), 'missing file');

    expect(error).toMatchObject({ _tag: 'IOError', operation: 'ReadFile', path: CONF_PATH, code: 'FS_NOT_FOUND' });
    expect(error.message).toBe(`ReadFile(${CONF_PATH}) failed: Not found: ${CONF_PATH}`);
  });

  it('fails with ParseError on malformed JSON', () => {
    const fs = new InMemoryFileSystem().addDir('/v23').addFile(CONF_PATH, '{ "go-workspaces": [');
    const error = expectErr(loadToolsConfig(makeContext(fs)), 'malformed');

    expect(error._tag).toBe('ParseError');
    if (error._tag !== 'ParseError') return;
    expect(error.source).toBe(CONF_PATH);
    expect(error.message.startsWith(`Failed to parse ${CONF_PATH}: `)).toBe(true);
  });

  it('fails with ParseError when a workspace list has the wrong shape', () => {
    const error = expectErr(loadToolsConfig(makeContext(makeTree({ 'go-workspaces': 'release/go' }))), 'bad shape');

    expect(error._tag).toBe('ParseError');
    if (error._tag !== 'ParseError') return;
    expect(error.details.startsWith('go-workspaces: ')).toBe(true);
  });

  it('propagates registry lookup failures', () => {
    const error = expectErr(loadToolsConfig(makeContext(makeTree(), { V23_ROOT: '/v23' }, { toolName: 'jiri' })), 'tool');
    expect(error._tag).toBe('NotFoundError');
  });
});
