/** Where a dry run writes its plan instead of calling GitHub. */
export interface DryRunOutput {
  dryRun: true;
  print: (line: string) => void;
}

export const DRY_RUN_BANNER = '\n=== DRY RUN MODE ===';
