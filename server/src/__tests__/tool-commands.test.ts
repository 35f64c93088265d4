import { describe, it, expect } from 'vitest';
import { buildDocArgs, buildIdeaArgs, formatToolDate } from '../pipeline/tool-commands.js';
import { EXAMPLE_PIPELINE_CONFIG, type PipelineConfig } from '../pipeline/schemas/pipeline-config.js';
import type { Topic } from '../pipeline/types.js';

const topic: Topic = { id: 0, title: 'Remote Onboarding', previewText: '', wordCount: 0 };

describe('formatToolDate', () => {
  it('converts YYYY-MM-DD to MMDDYYYY', () => {
    expect(formatToolDate('2025-01-31')).toBe('01312025');
  });
});

describe('buildIdeaArgs', () => {
  it('includes every configured idea option', () => {
    expect(buildIdeaArgs(EXAMPLE_PIPELINE_CONFIG)).toEqual([
      '--mode', 'test',
      '--source', 'source_a',
      '--save-local',
      '--start-date', '01012025',
      '--label', 'AIQ',
      '--focus', 'AI transformation and business strategy',
    ]);
  });

  it('omits optional flags that are unset and adds combined topics when enabled', () => {
    const config: PipelineConfig = {
      ...EXAMPLE_PIPELINE_CONFIG,
      mode: 'production',
      idea: { source: 'source_b', combinedTopics: true },
    };
    expect(buildIdeaArgs(config)).toEqual([
      '--mode', 'production', '--source', 'source_b', '--save-local', '--combined-topics',
    ]);
  });
});

describe('buildDocArgs', () => {
  it('builds the document tool arguments for one topic', () => {
    expect(buildDocArgs(EXAMPLE_PIPELINE_CONFIG, topic)).toEqual([
      '--mode', 'test',
      '--topic', 'Remote Onboarding',
      '--audience', 'business executives',
      '--type', 'blog post',
      '--size', '800 words',
      '--output', './output',
    ]);
  });

  it('prefers the document mode and passes style, story and topic files', () => {
    const config: PipelineConfig = {
      ...EXAMPLE_PIPELINE_CONFIG,
      doc: {
        ...EXAMPLE_PIPELINE_CONFIG.doc,
        mode: 'production',
        styleFile: 'style.md',
        storyFile: 'story.md',
      },
    };
    const args = buildDocArgs(config, { ...topic, sourcePath: '/sessions/s1/topics/topic_1.md' });
    expect(args.slice(0, 6)).toEqual([
      '--mode', 'production',
      '--topic', 'Remote Onboarding',
      '--topic-file', '/sessions/s1/topics/topic_1.md',
    ]);
    expect(args.slice(-4)).toEqual(['--style', 'style.md', '--customer-story', 'story.md']);
  });
});
