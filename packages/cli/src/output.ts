import type { GenerationReport, ManifestBlock } from '@ucsc-recipes/shared-types';

export type OutputMode = 'json' | 'human' | 'markdown';
const OUTPUT_SCHEMA_VERSION = '1.0.0';

export interface LocateResult {
  program: string;
  source_path?: string;
  program_source_dir?: string;
}

export type CommandOutput =
  | { command: 'generate'; data: GenerationReport }
  | { command: 'parse'; data: ManifestBlock[] }
  | { command: 'locate'; data: LocateResult };

function bulletList(items: string[]) {
  return items.map((item) => `- ${item}`).join('\n');
}

// Manual descriptions span several lines; keep listings on one line per entry.
function oneLine(text: string) {
  return text.trim().replace(/\s+/g, ' ');
}

export function renderOutput(output: CommandOutput, mode: OutputMode) {
  if (mode === 'json') {
    return JSON.stringify(
      {
        ok: true,
        schema_version: OUTPUT_SCHEMA_VERSION,
        command: output.command,
        data: output.data,
      },
      null,
      2,
    );
  }

  if (mode === 'markdown') {
    return renderMarkdown(output);
  }

  return renderHuman(output);
}

function renderHuman(output: CommandOutput): string {
  switch (output.command) {
    case 'generate':
      return renderGenerateHuman(output.data);
    case 'parse':
      return renderBlocksHuman(output.data);
    case 'locate':
      return [
        `program: ${output.data.program}`,
        `source: ${output.data.source_path ?? 'not found'}`,
        `build dir: ${output.data.program_source_dir ?? 'not found'}`,
      ].join('\n');
  }
}

function renderMarkdown(output: CommandOutput): string {
  switch (output.command) {
    case 'generate':
      return renderGenerateMarkdown(output.data);
    case 'parse':
      return renderBlocksMarkdown(output.data);
    case 'locate':
      return `## locate\n\n${bulletList([
        `**Program**: ${output.data.program}`,
        `**Source**: ${output.data.source_path ? `\`${output.data.source_path}\`` : 'not found'}`,
        `**Build dir**: ${
          output.data.program_source_dir ? `\`${output.data.program_source_dir}\`` : 'not found'
        }`,
      ])}`;
  }
}

function renderGenerateHuman(report: GenerationReport) {
  const header = `Wrote ${report.written.length} recipes for userApps v${report.version} to ${report.recipes_dir}`;
  const written = report.written.map(
    (recipe) => `${recipe.package} (${recipe.source_dir ?? recipe.build_template})`,
  );
  const skipped = report.skipped.map((entry) => `skipped ${entry.program} (${entry.reason})`);
  return [header, ...written, ...skipped].join('\n');
}

function renderGenerateMarkdown(report: GenerationReport) {
  const rows = report.written.map(
    (recipe) =>
      `| ${recipe.package} | ${recipe.program} | ${recipe.source_dir ? `\`${recipe.source_dir}\`` : '-'} | ${
        recipe.build_template
      } |`,
  );
  const sections = [
    `## generate\n\n**Version**: ${report.version}\n\n**Recipes dir**: \`${report.recipes_dir}\``,
    rows.length > 0
      ? ['| Package | Program | Source | Build template |', '| --- | --- | --- | --- |', ...rows].join(
          '\n',
        )
      : 'No recipes written.',
  ];
  if (report.skipped.length > 0) {
    sections.push(
      `### Skipped\n\n${bulletList(report.skipped.map((entry) => `${entry.program} (${entry.reason})`))}`,
    );
  }
  return sections.join('\n\n');
}

function renderBlocksHuman(blocks: ManifestBlock[]) {
  if (blocks.length === 0) {
    return 'No programs found.';
  }

  return blocks
    .map((block, index) =>
      block.kind === 'header'
        ? `${index + 1}. ${block.program} (no summary line)`
        : `${index + 1}. ${block.program} - ${oneLine(block.description)}`,
    )
    .join('\n');
}

function renderBlocksMarkdown(blocks: ManifestBlock[]) {
  if (blocks.length === 0) {
    return '## parse\n\nNo programs found.';
  }

  return `## parse\n\n${bulletList(
    blocks.map((block) =>
      block.kind === 'header'
        ? `**${block.program}**: _no summary line_`
        : `**${block.program}**: ${oneLine(block.description)}`,
    ),
  )}`;
}
