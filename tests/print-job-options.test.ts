import { describe, expect, it } from 'vitest';

import { defaultJobOptions, JobOptionsBuilder } from '../src/models/print-job.model';

describe('JobOptionsBuilder', () => {
  it('starts from the lp defaults', () => {
    expect(new JobOptionsBuilder().build()).toEqual({
      destination: undefined,
      copies: undefined,
      title: undefined,
      jobOptions: {},
      variant: 'lp',
    });
    expect(defaultJobOptions()).toEqual({ jobOptions: {}, variant: 'lp' });
  });

  it('sets every field', () => {
    const options = new JobOptionsBuilder()
      .destination('Floor1')
      .copies(3)
      .title('Quarterly Report')
      .jobOption('media', 'na_letter_8.5x11in')
      .useLpr(true)
      .build();

    expect(options).toEqual({
      destination: 'Floor1',
      copies: 3,
      title: 'Quarterly Report',
      jobOptions: { media: 'na_letter_8.5x11in' },
      variant: 'lpr',
    });
  });

  it('clears optional fields', () => {
    const options = new JobOptionsBuilder()
      .destination('Floor1')
      .copies(3)
      .title('Draft')
      .clearDestination()
      .clearCopies()
      .clearTitle()
      .build();

    expect(options.destination).toBeUndefined();
    expect(options.copies).toBeUndefined();
    expect(options.title).toBeUndefined();
  });

  it('sets or clears the destination from an optional value', () => {
    expect(new JobOptionsBuilder().destinationIf('Floor2').build().destination).toBe('Floor2');
    expect(new JobOptionsBuilder().destination('Floor2').destinationIf(undefined).build().destination).toBeUndefined();
  });

  it('replaces all job options at once and single options by key', () => {
    const options = new JobOptionsBuilder()
      .jobOption('old', '1')
      .jobOptions({ sides: 'one-sided', media: 'a4' })
      .jobOption('sides', 'two-sided-long-edge')
      .build();

    expect(options.jobOptions).toEqual({ sides: 'two-sided-long-edge', media: 'a4' });
  });

  it('switches back to lp', () => {
    expect(new JobOptionsBuilder().useLpr(true).useLpr(false).build().variant).toBe('lp');
    expect(new JobOptionsBuilder().variant('lpr').build().variant).toBe('lpr');
  });

  it('rejects copy counts that are not non-negative integers', () => {
    const builder = new JobOptionsBuilder();
    expect(() => builder.copies(-1)).toThrow(RangeError);
    expect(() => builder.copies(1.5)).toThrow('copies must be a non-negative integer, got 1.5');
    expect(() => builder.copies(Number.NaN)).toThrow(RangeError);
    expect(builder.copies(0).build().copies).toBe(0);
  });

  it('does not share state with options it has already built', () => {
    const builder = new JobOptionsBuilder().jobOption('a', '1');
    const first = builder.build();
    builder.jobOption('b', '2');

    expect(first.jobOptions).toEqual({ a: '1' });
    expect(builder.build().jobOptions).toEqual({ a: '1', b: '2' });
  });

  it('copies an existing option set', () => {
    const source = new JobOptionsBuilder().useLpr(true).destination('Floor3').copies(2).title('T').jobOption('k', 'v').build();
    expect(JobOptionsBuilder.from(source).build()).toEqual(source);
  });
});
