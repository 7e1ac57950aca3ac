import { describe, it, expect, vi } from 'vitest';
import {
  parseDockerfile,
  parseEnvAssignments,
  parseStageCommand,
  splitWords,
  substituteArgs,
} from '../../../src/parsers/dockerfile.js';
import { GrammarError, MissingReferenceError } from '../../../src/errors.js';
import type { Logger } from '../../../src/ui/logger.js';

function mockLogger(): Logger {
  return { info: vi.fn(), step: vi.fn(), warn: vi.fn(), error: vi.fn(), success: vi.fn(), debug: vi.fn() };
}

function parse(raw: string, logger: Logger = mockLogger()) {
  return parseDockerfile(raw, 'Dockerfile', { logger });
}

describe('helpers', () => {
  it('splitWords keeps quoted spans together', () => {
    expect(splitWords(`A=1 B="two words" C='x y'`)).toEqual(['A=1', 'B="two words"', "C='x y'"]);
  });

  it('parseStageCommand tags JSON arrays and raw strings', () => {
    expect(parseStageCommand('["echo", "hi"]')).toEqual({ kind: 'exec', tokens: ['echo', 'hi'] });
    expect(parseStageCommand('python app.py')).toEqual({ kind: 'shell', text: 'python app.py' });
    expect(parseStageCommand('[not json')).toEqual({ kind: 'shell', text: '[not json' });
    expect(parseStageCommand('')).toBeUndefined();
  });

  it('parseEnvAssignments handles both ENV forms', () => {
    expect(parseEnvAssignments('A=1 B="two words"')).toEqual(['A=1', 'B="two words"']);
    expect(parseEnvAssignments('MSG hello world')).toEqual(['MSG="hello world"']);
    expect(parseEnvAssignments('PATH /usr/local/bin:$PATH')).toEqual(['PATH=/usr/local/bin:$PATH']);
  });

  it('substituteArgs replaces both reference forms', () => {
    const args = new Map([['VERSION', '3.19']]);
    expect(substituteArgs('alpine:${VERSION}', args)).toBe('alpine:3.19');
    expect(substituteArgs('alpine:$VERSION', args)).toBe('alpine:3.19');
    expect(substituteArgs('alpine:$VERSIONS', args)).toBe('alpine:$VERSIONS');
  });
});

describe('parseDockerfile', () => {
  it('collects install lines, environment and command of a single stage', () => {
    const recipe = parse(`FROM alpine:latest
RUN apk add curl
ENV A=1 B="two words"
CMD ["echo", "hi"]
`);
    expect(recipe.stages).toHaveLength(1);
    const [stage] = recipe.stages;
    expect(stage.fromHeader).toBe('alpine:latest');
    expect(stage.name).toBe('stage-1');
    expect(stage.install).toEqual(['apk add curl', 'A=1', 'B="two words"']);
    expect(stage.environment).toEqual(['A=1', 'B="two words"']);
    expect(stage.cmd).toEqual({ kind: 'exec', tokens: ['echo', 'hi'] });
  });

  it('splits multi-stage builds and records cross-stage copies', () => {
    const recipe = parse(`FROM golang:1.22 AS builder
WORKDIR /src
COPY main.go .
RUN go build -o /out/app
FROM alpine:3.19
COPY --from=builder /out/app /usr/local/bin/app
ENTRYPOINT ["/usr/local/bin/app"]
`);
    const [builder, runtime] = recipe.stages;
    expect(builder.name).toBe('builder');
    expect(builder.named).toBe(true);
    expect(builder.install).toEqual(['mkdir -p /src', 'cd /src', 'go build -o /out/app']);
    expect(builder.workdir).toBe('/src');
    expect(builder.files).toEqual([{ source: 'main.go', destination: '.' }]);

    expect(runtime.index).toBe(2);
    expect(runtime.name).toBe('stage-2');
    expect(runtime.files).toEqual([]);
    expect(runtime.stageFiles.get('builder')).toEqual([{ source: '/out/app', destination: '/usr/local/bin/app' }]);
    expect(runtime.entrypoint).toEqual({ kind: 'exec', tokens: ['/usr/local/bin/app'] });
  });

  it('resolves --from by stage index', () => {
    const recipe = parse(`FROM golang AS build
FROM alpine
COPY --from=0 /out /out
`);
    expect([...recipe.stages[1].stageFiles.keys()]).toEqual(['build']);
  });

  it('substitutes build arguments into FROM and keeps them as assignments', () => {
    const recipe = parse(`ARG VERSION=3.19
FROM alpine:\${VERSION}
`);
    expect(recipe.stages).toHaveLength(1);
    expect(recipe.stages[0].fromHeader).toBe('alpine:3.19');
    expect(recipe.stages[0].install).toEqual(['VERSION=3.19']);
  });

  it('skips ARG without a default with a warning', () => {
    const logger = mockLogger();
    const recipe = parse('FROM alpine\nARG TOKEN\n', logger);
    expect(recipe.stages[0].install).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('ARG TOKEN has no default value and is skipped (line 2)');
  });

  it('follows line continuations and drops comments inside them', () => {
    const recipe = parse(`FROM alpine
RUN apk add \\
    # tools
    curl \\
    git
# trailing note
`);
    expect(recipe.stages[0].install).toEqual(['apk add \\', 'curl \\', 'git', '# trailing note']);
  });

  it('treats a keyword after a continuation marker as part of the instruction', () => {
    const recipe = parse(`FROM alpine
RUN echo one \\
    run twice
`);
    expect(recipe.stages[0].install).toEqual(['echo one \\', 'run twice']);
  });

  it('joins a continued COPY into one instruction', () => {
    const recipe = parse(`FROM node:20
COPY package.json \\
     package-lock.json ./
`);
    expect(recipe.stages[0].files).toEqual([
      { source: 'package.json', destination: './' },
      { source: 'package-lock.json', destination: './' },
    ]);
  });

  it('joins a JSON CMD split across lines', () => {
    const recipe = parse(`FROM alpine
CMD ["echo", \\
     "hi"]
`);
    expect(recipe.stages[0].cmd).toEqual({ kind: 'exec', tokens: ['echo', 'hi'] });
  });

  it('joins a continued LABEL, quoted value included', () => {
    const recipe = parse(`FROM alpine
LABEL description="a \\
  b" version=1
`);
    expect(recipe.stages[0].labels).toEqual([
      { key: 'description', value: 'a b' },
      { key: 'version', value: '1' },
    ]);
  });

  it('reports errors in a continued instruction at its first line', () => {
    let error: unknown;
    try {
      parse(`FROM alpine
COPY \\
  only-one
`);
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(GrammarError);
    expect(error).toHaveProperty('location', { file: 'Dockerfile', line: 2 });
  });

  it('matches keywords case-insensitively', () => {
    const recipe = parse('from alpine\nrun echo hi\n');
    expect(recipe.stages[0].fromHeader).toBe('alpine');
    expect(recipe.stages[0].install).toEqual(['echo hi']);
  });

  it('turns ADD of a URL into a download', () => {
    const recipe = parse('FROM alpine\nADD https://example.com/app.tar.gz /opt/\n');
    expect(recipe.stages[0].install).toEqual(['curl -fsSL https://example.com/app.tar.gz -o /opt/app.tar.gz']);
    expect(recipe.stages[0].files).toEqual([]);
  });

  it('copies and extracts local archives', () => {
    const recipe = parse('FROM alpine\nADD files.tar.gz /opt\n');
    expect(recipe.stages[0].files).toEqual([{ source: 'files.tar.gz', destination: '/opt' }]);
    expect(recipe.stages[0].install).toEqual(['tar -xf /opt/files.tar.gz -C /opt']);
  });

  it('accepts several sources and the JSON form', () => {
    const recipe = parse('FROM alpine\nCOPY a.txt b.txt /data/\nCOPY ["my file.txt", "/data/"]\n');
    expect(recipe.stages[0].files).toEqual([
      { source: 'a.txt', destination: '/data/' },
      { source: 'b.txt', destination: '/data/' },
      { source: 'my file.txt', destination: '/data/' },
    ]);
  });

  it('resolves copy sources against the build context', () => {
    const recipe = parseDockerfile('FROM alpine\nCOPY app.py /app/\n', 'ctx/Dockerfile', { context: './ctx' });
    expect(recipe.stages[0].files).toEqual([{ source: './ctx/app.py', destination: '/app/' }]);
  });

  it('drops unsupported COPY flags with a warning', () => {
    const logger = mockLogger();
    const recipe = parse('FROM alpine\nCOPY --chown=app:app run.sh /run.sh\n', logger);
    expect(recipe.stages[0].files).toEqual([{ source: 'run.sh', destination: '/run.sh' }]);
    expect(logger.warn).toHaveBeenCalledWith('COPY --chown is not supported and is dropped (line 2)');
  });

  it('records the health check command', () => {
    const recipe = parse('FROM nginx\nHEALTHCHECK --interval=5s CMD curl -f http://localhost/\n');
    expect(recipe.stages[0].test).toBe('curl -f http://localhost/');

    const cleared = parse('FROM nginx\nHEALTHCHECK CMD true\nHEALTHCHECK NONE\n');
    expect(cleared.stages[0].test).toBeUndefined();
  });

  it('collects labels and the maintainer', () => {
    const recipe = parse('FROM alpine\nLABEL version=1.0 "description"="two words"\nMAINTAINER Jane\n');
    expect(recipe.stages[0].labels).toEqual([
      { key: 'version', value: '1.0' },
      { key: 'description', value: 'two words' },
      { key: 'maintainer', value: 'Jane' },
    ]);
  });

  it('keeps volumes, ports and the stop signal as metadata and comments', () => {
    const recipe = parse('FROM nginx\nVOLUME /data\nEXPOSE 80 443\nSTOPSIGNAL SIGQUIT\n');
    const [stage] = recipe.stages;
    expect(stage.volumes).toEqual(['/data']);
    expect(stage.ports).toEqual(['80', '443']);
    expect(stage.stopSignal).toBe('SIGQUIT');
    expect(stage.install).toEqual(['# VOLUME /data', '# EXPOSE 80 443', '# STOPSIGNAL SIGQUIT']);
  });

  it('passes unknown instructions through to the install lines', () => {
    const recipe = parse('FROM alpine\nUSER nobody\nSHELL ["/bin/sh", "-c"]\n');
    expect(recipe.stages[0].install).toEqual(['USER nobody', 'SHELL ["/bin/sh", "-c"]']);
  });

  it('warns about scratch base images', () => {
    const logger = mockLogger();
    parse('FROM scratch\n', logger);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('rejects duplicate stage names', () => {
    expect(() => parse('FROM alpine AS base\nFROM debian AS base\n')).toThrow('Duplicate stage name "base"');
  });

  it('rejects copies from undeclared stages', () => {
    expect(() => parse('FROM alpine\nCOPY --from=builder /out /out\n')).toThrow(MissingReferenceError);
  });

  it('locates malformed ENV instructions', () => {
    let error: unknown;
    try {
      parse('FROM alpine\nENV A=1 junk\n');
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(GrammarError);
    expect(error).toHaveProperty('location', { file: 'Dockerfile', line: 2 });
  });

  it('leaves a stage without FROM unresolved', () => {
    const recipe = parse('RUN echo hi\n');
    expect(recipe.stages[0].fromHeader).toBeUndefined();
    expect(recipe.stages[0].install).toEqual(['echo hi']);
  });
});
