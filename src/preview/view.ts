/**
 * Text layout of the preview: title, control bar, status line, frame.
 */

import chalk from 'chalk';
import type { PreviewStatus } from '../types/index.js';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export type PreviewViewModel = {
  workspace: string;
  layer: string;
  status: PreviewStatus;
  zoom: number;
  styleLabel: string;
  protocolLabel: string;
  errorMessage: string;
  frame: string;
  spinnerIndex: number;
};

const renderKey = (key: string) => chalk.cyan.bold(key);

export function renderControlBar(model: PreviewViewModel): string {
  const zoomSection = `Zoom: ${renderKey('-')} ${model.zoom.toFixed(1)} ${renderKey('+')}`;
  const panSection = `Pan: ${renderKey('←')} ${renderKey('↑')} ${renderKey('↓')} ${renderKey('→')}`;
  const styleSection = `Style: ${model.styleLabel} ${chalk.gray('(s/S)')}`;
  const renderSection = `Render: ${model.protocolLabel}`;
  const actionSection = `${renderKey('r')} refresh  ${renderKey('esc')} close`;
  return [zoomSection, panSection, styleSection, renderSection, actionSection].join('  │  ');
}

export function renderPreviewView(model: PreviewViewModel): string {
  if (model.status === 'closed') return '';

  const lines: string[] = [];
  lines.push(chalk.bold.white.bgBlue(` Layer Preview: ${model.workspace}:${model.layer} `));
  lines.push('');
  lines.push(renderControlBar(model));
  lines.push('');

  if (model.status === 'error') {
    lines.push(chalk.red(`Error: ${model.errorMessage}`));
  } else if (model.status === 'loading') {
    const spinner = SPINNER_FRAMES[model.spinnerIndex % SPINNER_FRAMES.length];
    lines.push(`${chalk.yellow(spinner)} Loading map...`);
  }

  let out = lines.join('\n') + '\n';
  if (model.status === 'ready' && model.frame) {
    out += model.frame;
  }
  return out;
}
