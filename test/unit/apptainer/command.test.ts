import { describe, it, expect } from 'vitest';
import { formatCommand, runImage, synthesizeCommand } from '../../../src/apptainer/command.js';
import { parseComposeDocument } from '../../../src/parsers/compose.js';
import { MissingFieldError } from '../../../src/errors.js';
import type { Service } from '../../../src/types/index.js';

function serviceFrom(raw: string): Service {
  return parseComposeDocument(raw, 'compose.yaml').declarations[0].service;
}

const up = { action: 'up', writableTmpfs: false } as const;

describe('synthesizeCommand', () => {
  it('executes the configured command in the registry image', () => {
    const service = serviceFrom(`services:
  hello:
    image: alpine:latest
    command: echo "valid_alpine"
`);
    expect(formatCommand(synthesizeCommand(service, up))).toBe('apptainer exec docker://alpine:latest echo "valid_alpine"');
  });

  it('runs the default runscript with one bind flag per volume in order', () => {
    const service = serviceFrom(`services:
  mounts:
    image: alpine:latest
    volumes:
      - ./:/mount/
      - ./:/mount_2/
`);
    expect(synthesizeCommand(service, up)).toEqual([
      'apptainer',
      'run',
      '--bind',
      './:/mount/',
      '--bind',
      './:/mount_2/',
      'docker://alpine:latest',
    ]);
  });

  it('builds and then runs the artifact of a build service', () => {
    const service = serviceFrom(`services:
  valid_build:
    build: .
`);
    expect(formatCommand(synthesizeCommand(service, { action: 'build' }))).toBe(
      'apptainer build -F valid_build.sif valid_build.def',
    );
    expect(formatCommand(synthesizeCommand(service, up))).toBe('apptainer run valid_build.sif');
  });

  it('prefers the build artifact over the image', () => {
    const service = serviceFrom(`services:
  app:
    image: alpine
    build: ./ctx
`);
    expect(runImage(service)).toBe('./ctx/app.sif');
  });

  it('adds the writable overlay and environment flags', () => {
    const service = serviceFrom(`services:
  app:
    image: alpine
    environment:
      A: 1
      EMPTY: null
`);
    expect(synthesizeCommand(service, { action: 'up', writableTmpfs: true })).toEqual([
      'apptainer',
      'run',
      '--writable-tmpfs',
      '--env',
      "A='1'",
      '--env',
      'EMPTY=',
      'docker://alpine',
    ]);
  });

  it('replaces the service command with ad-hoc arguments', () => {
    const service = serviceFrom(`services:
  app:
    image: alpine
    command: echo hi
`);
    expect(formatCommand(synthesizeCommand(service, { action: 'run', writableTmpfs: false, args: ['ls', '/'] }))).toBe(
      'apptainer exec docker://alpine ls /',
    );
    expect(formatCommand(synthesizeCommand(service, { action: 'run', writableTmpfs: false, args: [] }))).toBe(
      'apptainer exec docker://alpine echo hi',
    );
  });

  it('uses the configured binary', () => {
    const service = serviceFrom(`services:
  app:
    image: alpine
`);
    expect(synthesizeCommand(service, up, '/opt/bin/singularity')[0]).toBe('/opt/bin/singularity');
  });

  it('fails without an image or a build directive', () => {
    const service = serviceFrom(`services:
  empty:
    command: echo hi
`);
    expect(() => synthesizeCommand(service, up)).toThrow(MissingFieldError);
    expect(() => synthesizeCommand(service, { action: 'build' })).toThrow(MissingFieldError);
  });
});
