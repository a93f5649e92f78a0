/**
 * Runtime validation for pagination output
 */

import { lineWidth } from './layout/graphemes.js';
import type { Pagination, Size, ValidationResult } from './types.js';

/**
 * Validate a pagination against the page size and return any issues found
 */
export function validatePagination(pagination: Pagination, size: Size): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { pages, chapterStarts, anchors } = pagination;

  // Check 1: Something was produced
  if (pages.length === 0) {
    warnings.push('No pages were generated');
  }

  // Check 2: Page heights, and only the last page may be empty
  pages.forEach((page, pageIndex) => {
    if (page.lines.length > size.height) {
      errors.push(
        `Page ${pageIndex} has ${page.lines.length} lines (height is ${size.height})`,
      );
    }
    if (page.lines.length === 0 && pageIndex < pages.length - 1) {
      errors.push(`Page ${pageIndex} is empty`);
    }

    // Check 3: Line widths
    page.lines.forEach((line, lineIndex) => {
      const width = lineWidth(line);
      if (width > size.width) {
        warnings.push(
          `Line ${lineIndex} on page ${pageIndex} is ${width} cells wide (width is ${size.width})`,
        );
      }
    });
  });

  // Check 4: Chapter starts
  if (chapterStarts[0] !== 0) {
    errors.push('Chapter starts do not begin at page 0');
  }
  for (let i = 1; i < chapterStarts.length; i++) {
    if (chapterStarts[i] <= chapterStarts[i - 1]) {
      errors.push(
        `Chapter start ${chapterStarts[i]} does not follow ${chapterStarts[i - 1]}`,
      );
    }
  }
  const lastStart = chapterStarts[chapterStarts.length - 1];
  if (pages.length > 0 && lastStart !== undefined && lastStart >= pages.length) {
    errors.push(`Chapter start ${lastStart} is beyond the last page`);
  }

  // Check 5: Anchors point at existing pages
  for (const [name, pageIndex] of anchors) {
    if (pageIndex < 0 || pageIndex >= pages.length) {
      errors.push(`Anchor "${name}" points at missing page ${pageIndex}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Log validation results to console
 */
export function logValidationResult(result: ValidationResult): void {
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      console.log(`  Error: ${error}`);
    }
  }

  if (result.warnings.length > 0) {
    for (const warning of result.warnings) {
      console.log(`  Warning: ${warning}`);
    }
  }

  if (result.errors.length === 0 && result.warnings.length === 0) {
    console.log('  All checks passed');
  }
}
