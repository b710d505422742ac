import type { ToolVariant } from './tool-dialect.model';

/**
 * Options for one print job. Every string here may come from an untrusted
 * caller and is quoted before it reaches a shell, except `jobOptions`, which
 * is emitted raw as `-o key=value`.
 */
export interface JobOptions {
  /** Printer or queue name (`lp -d` / `lpr -P`) */
  readonly destination?: string;
  /** Number of copies (`lp -n` / `lpr -#`); a non-negative integer */
  readonly copies?: number;
  /** Job title (`lp -t` / `lpr -J`) */
  readonly title?: string;
  /** Backend `key=value` settings such as `sides=two-sided-long-edge`, rendered in key order */
  readonly jobOptions: Readonly<Record<string, string>>;
  readonly variant: ToolVariant;
}

export type PrintContent =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'file'; readonly path: string };

export function textContent(text: string): PrintContent {
  return { kind: 'text', text };
}

export function fileContent(path: string): PrintContent {
  return { kind: 'file', path };
}

export function defaultJobOptions(): JobOptions {
  return { jobOptions: {}, variant: 'lp' };
}

/** Fluent construction of {@link JobOptions}; each call returns the same builder */
export class JobOptionsBuilder {
  private destinationValue?: string;
  private copiesValue?: number;
  private titleValue?: string;
  private options: Record<string, string> = {};
  private variantValue: ToolVariant = 'lp';

  static from(options: JobOptions): JobOptionsBuilder {
    const builder = new JobOptionsBuilder()
      .destinationIf(options.destination)
      .jobOptions(options.jobOptions)
      .variant(options.variant);
    if (options.copies !== undefined) builder.copies(options.copies);
    if (options.title !== undefined) builder.title(options.title);
    return builder;
  }

  destination(destination: string): this {
    this.destinationValue = destination;
    return this;
  }

  /** Set the destination, or clear it when `destination` is undefined */
  destinationIf(destination: string | undefined): this {
    this.destinationValue = destination;
    return this;
  }

  clearDestination(): this {
    this.destinationValue = undefined;
    return this;
  }

  copies(copies: number): this {
    if (!Number.isSafeInteger(copies) || copies < 0) {
      throw new RangeError(`copies must be a non-negative integer, got ${copies}`);
    }
    this.copiesValue = copies;
    return this;
  }

  clearCopies(): this {
    this.copiesValue = undefined;
    return this;
  }

  title(title: string): this {
    this.titleValue = title;
    return this;
  }

  clearTitle(): this {
    this.titleValue = undefined;
    return this;
  }

  /** Replace every job option */
  jobOptions(options: Readonly<Record<string, string>>): this {
    this.options = { ...options };
    return this;
  }

  /** Insert or replace a single job option */
  jobOption(key: string, value: string): this {
    this.options[key] = value;
    return this;
  }

  variant(variant: ToolVariant): this {
    this.variantValue = variant;
    return this;
  }

  useLpr(useLpr: boolean): this {
    this.variantValue = useLpr ? 'lpr' : 'lp';
    return this;
  }

  build(): JobOptions {
    return {
      destination: this.destinationValue,
      copies: this.copiesValue,
      title: this.titleValue,
      jobOptions: { ...this.options },
      variant: this.variantValue,
    };
  }
}
