import { existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { extname, join } from 'node:path';
import type { EmissionResult, EmittedTask, ReviewTask } from '../types.js';
import { buildInstructionFile } from './builder.js';
import { MarkerStore } from './markers.js';
import { computeReviewId } from './reviewId.js';

/**
 * Writes one `{reviewId}.md` instruction file per review task into a
 * directory shared with the pass markers.
 */
export class InstructionWriter {
  readonly markers: MarkerStore;

  constructor(
    readonly projectRoot: string,
    readonly instructionsDir: string,
  ) {
    this.markers = new MarkerStore(instructionsDir);
  }

  /**
   * Clear instruction files from the previous run, then write a file for every
   * task without a pass marker. Markers are left in place.
   */
  writeInstructionFiles(tasks: readonly ReviewTask[]): EmissionResult {
    this.clearInstructionFiles();
    mkdirSync(this.instructionsDir, { recursive: true });

    const emitted: EmittedTask[] = [];
    let skippedCount = 0;

    for (const task of tasks) {
      const reviewId = computeReviewId(task, this.projectRoot);

      if (this.markers.isPassed(reviewId)) {
        skippedCount++;
        continue;
      }

      const filePath = join(this.instructionsDir, `${reviewId}.md`);
      writeFileSync(filePath, buildInstructionFile(task, reviewId), 'utf-8');
      emitted.push({ task, reviewId, filePath });
    }

    return { emitted, skippedCount };
  }

  /** Remove `.md` files only; everything else (markers) survives */
  clearInstructionFiles(): void {
    if (!existsSync(this.instructionsDir)) return;

    for (const entry of readdirSync(this.instructionsDir, { withFileTypes: true })) {
      if (entry.isFile() && extname(entry.name) === '.md') {
        rmSync(join(this.instructionsDir, entry.name));
      }
    }
  }
}
