import type { PipelineConfig } from './schemas/pipeline-config.js';
import type { Topic } from './types.js';

/** The idea tool takes its start date as MMDDYYYY. */
export function formatToolDate(isoDate: string): string {
  const [year, month, day] = isoDate.split('-');
  return `${month}${day}${year}`;
}

export function buildIdeaArgs(config: PipelineConfig): string[] {
  const { idea } = config;
  const args = ['--mode', config.mode, '--source', idea.source, '--save-local'];
  if (idea.startDate) args.push('--start-date', formatToolDate(idea.startDate));
  if (idea.label) args.push('--label', idea.label);
  if (idea.focus) args.push('--focus', idea.focus);
  if (idea.combinedTopics) args.push('--combined-topics');
  return args;
}

export function buildDocArgs(config: PipelineConfig, topic: Topic): string[] {
  const { doc } = config;
  const args = ['--mode', doc.mode ?? config.mode, '--topic', topic.title];
  if (topic.sourcePath) args.push('--topic-file', topic.sourcePath);
  args.push(
    '--audience', doc.audience,
    '--type', doc.docType,
    '--size', doc.size,
    '--output', doc.outputLocation,
  );
  if (doc.styleFile) args.push('--style', doc.styleFile);
  if (doc.storyFile) args.push('--customer-story', doc.storyFile);
  return args;
}
