// src/report/review-reporter.ts

import { writeFile } from 'node:fs/promises';
import chalk, { type ForegroundColorName } from 'chalk';
import type { Label, ReviewIssue, ReviewResult, Severity } from '../agents/review-engine-types.js';

export interface ReviewHeader {
  prNumber: number;
  title: string;
  repo: string;
}

export interface ExportedIssue {
  severity: string;
  category: string;
  title: string;
  description: string;
  line_number: number | null;
  file_path: string | null;
  suggestion: string | null;
}

export interface ReviewExport {
  pr_number: number;
  repo: string;
  overall_score: number;
  summary: string;
  recommendations: string[];
  issues: ExportedIssue[];
}

const SEVERITY_COLORS: Record<Severity, ForegroundColorName> = {
  critical: 'red',
  high: 'red',
  medium: 'yellow',
  low: 'blue',
  info: 'green',
};

export function severityColor(severity: Label<Severity>): ForegroundColorName {
  return severity.known ? SEVERITY_COLORS[severity.value] : 'white';
}

export function scoreColor(score: number): ForegroundColorName {
  if (score >= 80) return 'green';
  if (score >= 60) return 'yellow';
  return 'red';
}

function panel(title: string, body: string, color: ForegroundColorName): string {
  const border = chalk[color];
  const lines = body.split('\n').map(line => `${border('│')} ${line}`);
  return [border(`╭─ ${title}`), ...lines, border('╰─')].join('\n');
}

function renderIssueTable(issues: ReviewIssue[]): string {
  const headers = ['Severity', 'Category', 'Title', 'File', 'Line'];
  const rows = issues.map(issue => [
    issue.severity.value.toUpperCase(),
    issue.category.value,
    issue.title,
    issue.filePath ?? 'N/A',
    issue.lineNumber !== undefined ? String(issue.lineNumber) : 'N/A',
  ]);
  const widths = headers.map((header, col) => Math.max(header.length, ...rows.map(row => row[col].length)));

  const lines = [
    chalk.bold('🚨 Issues Found'),
    chalk.bold(headers.map((header, col) => header.padEnd(widths[col])).join('  ').trimEnd()),
    widths.map(width => '─'.repeat(width)).join('  '),
  ];

  rows.forEach((row, i) => {
    const cells = row.map((cell, col) => cell.padEnd(widths[col]));
    cells[0] = chalk[severityColor(issues[i].severity)](cells[0]);
    cells[1] = chalk.cyan(cells[1]);
    lines.push(cells.join('  ').trimEnd());
  });

  return lines.join('\n');
}

function renderIssueDetail(issue: ReviewIssue, index: number): string {
  const body = [
    chalk.bold(issue.title),
    '',
    `${chalk.bold('Description:')} ${issue.description}`,
    '',
    `${chalk.bold('Category:')} ${issue.category.value}`,
    `${chalk.bold('Severity:')} ${issue.severity.value}`,
    `${chalk.bold('File:')} ${issue.filePath ?? 'N/A'}`,
    `${chalk.bold('Line:')} ${issue.lineNumber ?? 'N/A'}`,
    '',
    `${chalk.bold.green('Suggestion:')} ${issue.suggestion || 'No specific suggestion provided'}`,
  ].join('\n');

  const urgent = issue.severity.value === 'critical' || issue.severity.value === 'high';
  return panel(`Issue #${index}`, body, urgent ? 'red' : 'yellow');
}

export function renderReview(result: ReviewResult, header: ReviewHeader): string {
  const sections: string[] = [];

  sections.push(panel(
    '🔍 PR Code Review',
    `${chalk.bold.blue(`Code Review Results for PR #${header.prNumber}`)}\n${chalk.bold(header.title)}\nRepository: ${header.repo}`,
    'blue'
  ));

  const color = scoreColor(result.overallScore);
  sections.push(panel(
    '📊 Score',
    `${chalk.bold('Overall Code Quality Score: ')}${chalk[color](`${result.overallScore}/100`)}`,
    color
  ));

  if (result.summary) {
    sections.push(panel('📝 Summary', result.summary, 'cyan'));
  }

  if (result.issues.length > 0) {
    sections.push(renderIssueTable(result.issues));
    result.issues.forEach((issue, i) => sections.push(renderIssueDetail(issue, i + 1)));
  }

  if (result.recommendations.length > 0) {
    sections.push(panel(
      '💡 Top Recommendations',
      result.recommendations.map(rec => `• ${rec}`).join('\n'),
      'green'
    ));
  }

  if (result.issues.length === 0) {
    sections.push(panel('✅ Clean Code', chalk.bold.green('🎉 No issues found! The code looks good.'), 'green'));
  }

  return sections.join('\n\n');
}

export function displayReview(result: ReviewResult, header: ReviewHeader): void {
  console.log(`\n${renderReview(result, header)}\n`);
}

export function buildReviewExport(result: ReviewResult, prNumber: number, repo: string): ReviewExport {
  return {
    pr_number: prNumber,
    repo,
    overall_score: result.overallScore,
    summary: result.summary,
    recommendations: result.recommendations,
    issues: result.issues.map(issue => ({
      severity: issue.severity.value,
      category: issue.category.value,
      title: issue.title,
      description: issue.description,
      line_number: issue.lineNumber ?? null,
      file_path: issue.filePath ?? null,
      suggestion: issue.suggestion ?? null,
    })),
  };
}

export async function saveReviewExport(outputPath: string, data: ReviewExport): Promise<void> {
  await writeFile(outputPath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
}
