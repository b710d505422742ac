export const TOOL_VARIANTS = ['lp', 'lpr'] as const;

export type ToolVariant = (typeof TOOL_VARIANTS)[number];

/** Flag spellings of one print tool. Both tools take the same semantic options. */
export interface ToolDialect {
  readonly program: string;
  readonly destinationFlag: string;
  readonly titleFlag: string;
  /** Render the copies option, already in decimal digits, as one command-line token */
  readonly formatCopies: (digits: string) => string;
}

export const TOOL_DIALECTS: Readonly<Record<ToolVariant, ToolDialect>> = {
  lp: {
    program: 'lp',
    destinationFlag: '-d',
    titleFlag: '-t',
    formatCopies: (digits) => `-n ${digits}`,
  },
  lpr: {
    program: 'lpr',
    destinationFlag: '-P',
    titleFlag: '-J',
    formatCopies: (digits) => `-#${digits}`,
  },
};

export function getToolDialect(variant: ToolVariant): ToolDialect {
  return TOOL_DIALECTS[variant];
}
