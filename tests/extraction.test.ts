import { describe, it, expect, vi } from 'vitest';

import {
  ExtractionPipeline,
  labelledValue,
  type ExtractionStrategy,
} from '../server/services/scrapers/extraction';
import { emptyCandidateFields } from '../server/services/scrapers/types';
import { findNextLocator } from '../server/services/scrapers/pagination';

const knownCities = ['Austin', 'Dallas', 'Fort Worth', 'Houston'];

describe('ExtractionPipeline cascade', () => {
  it('uses result blocks exclusively when both blocks and a results table exist', () => {
    const html = `
      <div class="attorney-result"><h3>Jane Roe</h3></div>
      <div class="attorney-result"><h3>John Doe</h3></div>
      <table class="results"><tr><th>Name</th></tr><tr><td><a>Table Person</a></td><td>Austin</td></tr></table>`;

    const result = new ExtractionPipeline({ knownCities }).extract(html);

    expect(result.strategy).toBe('result-block');
    expect(result.candidates.map(candidate => candidate.fields.name)).toEqual(['Jane Roe', 'John Doe']);
  });

  it('never invokes later strategies once one matches', () => {
    const first: ExtractionStrategy = {
      kind: 'result-block',
      tryExtract: () => ({ blocks: 0, candidates: [] }),
    };
    const second = { kind: 'result-table' as const, tryExtract: vi.fn(() => null) };

    const result = new ExtractionPipeline({}, [first, second]).extract('<p></p>');

    expect(second.tryExtract).not.toHaveBeenCalled();
    expect(result.strategy).toBe('result-block');
    expect(result.candidates).toEqual([]);
  });

  it('treats exactly the rows after the header as blocks of a results table', () => {
    const html = `
      <table class="member-table">
        <tr><th>Name</th><th>City</th><th>Bar</th></tr>
        <tr><td><a href="/profile?BarNumber=24001234">Jane Roe</a></td><td>Austin</td><td></td></tr>
        <tr><td><strong>Lee Chan</strong></td><td>Practicing in Fort Worth, TX</td><td>24011111</td></tr>
      </table>`;

    const result = new ExtractionPipeline({ knownCities }).extract(html);

    expect(result.strategy).toBe('result-table');
    expect(result.blocks).toBe(2);
    expect(result.candidates.map(candidate => [
      candidate.fields.name,
      candidate.fields.barNumber,
      candidate.fields.city,
    ])).toEqual([
      ['Jane Roe', '24001234', 'Austin'],
      ['Lee Chan', '24011111', 'Fort Worth'],
    ]);
  });

  it('falls back to the innermost matching containers', () => {
    const html = `
      <div id="results">
        <div class="member-card"><h4>Ana Ruiz</h4></div>
        <div class="member-card"><h4>Ben Ode</h4></div>
      </div>`;

    const result = new ExtractionPipeline().extract(html);

    expect(result.strategy).toBe('result-container');
    expect(result.candidates.map(candidate => candidate.fields.name)).toEqual(['Ana Ruiz', 'Ben Ode']);
  });

  it('reads a nested attorney card as one record', () => {
    const html = `
      <div class="attorney-card">
        <div class="attorney-name"><h3>Jane Roe</h3></div>
        <div class="attorney-details">Bar No: 24000001 Austin</div>
      </div>`;

    const result = new ExtractionPipeline({ knownCities: ['Austin'] }).extract(html);

    expect(result.strategy).toBe('result-container');
    expect(result.blocks).toBe(1);
    expect(result.candidates.map(candidate => candidate.fields.barNumber)).toEqual(['24000001']);
    expect(result.candidates[0].fields.city).toBe('Austin');
  });

  it('returns no candidates when no structure matches', () => {
    const result = new ExtractionPipeline().extract('<html><body><p>No records found.</p></body></html>');

    expect(result).toEqual({ strategy: null, blocks: 0, candidates: [], rejected: 0, errors: [] });
  });

  it('rejects blocks without a resolvable name', () => {
    const html = `
      <div class="search-result"><span>Bar No: 24000001</span></div>
      <div class="search-result"><h2>Kim Park</h2></div>`;

    const result = new ExtractionPipeline().extract(html);

    expect(result.blocks).toBe(2);
    expect(result.rejected).toBe(1);
    expect(result.candidates.map(candidate => candidate.fields.name)).toEqual(['Kim Park']);
  });

  it('reports an invalid configured selector and continues the cascade', () => {
    const html = '<table class="results"><tr><th>Name</th></tr><tr><td><a>Jo Ann</a></td><td>Dallas</td></tr></table>';

    const result = new ExtractionPipeline({ resultBlockSelectors: ['div:not-a-pseudo'] }).extract(html);

    expect(result.strategy).toBe('result-table');
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].startsWith('result-block: ')).toBe(true);
  });
});

describe('block fields', () => {
  it('reads labelled fields, contact links and practice areas', () => {
    const html = `
      <div class="attorney-result">
        <h3>Maria  Elena Garcia</h3>
        <p>Bar No: 24056789</p>
        <p>Houston</p>
        <p><strong>Firm:</strong> Garcia &amp; Lee LLP</p>
        <p>Status: Active</p>
        <p>Phone: (713) 555-0182</p>
        <a href="mailto:mgarcia@example.com">Email</a>
        <ul class="practice-areas"><li>Immigration</li><li>Family Law</li></ul>
      </div>`;

    const [candidate] = new ExtractionPipeline({ knownCities }).extract(html).candidates;

    expect(candidate.fields).toEqual({
      ...emptyCandidateFields(),
      name: 'Maria Elena Garcia',
      barNumber: '24056789',
      city: 'Houston',
      firm: 'Garcia & Lee LLP',
      status: 'Active',
      phone: '(713) 555-0182',
      email: 'mgarcia@example.com',
    });
    expect(candidate.practiceAreas).toEqual(['Immigration', 'Family Law']);
  });

  it('splits a labelled practice-area list and finds an unlabelled phone number', () => {
    const html = `
      <div class="member-listing">
        <h3>Sam Lowe</h3>
        <p>Practice Areas: Litigation; Family Law | Probate</p>
        <p>512.555.0100</p>
        <a href="https://lowe.example.com">Website</a>
      </div>`;

    const [candidate] = new ExtractionPipeline().extract(html).candidates;

    expect(candidate.practiceAreas).toEqual(['Litigation', 'Family Law', 'Probate']);
    expect(candidate.fields.phone).toBe('512.555.0100');
    expect(candidate.fields.website).toBe('https://lowe.example.com');
    expect(candidate.fields.barNumber).toBeNull();
    expect(candidate.fields.city).toBeNull();
  });

  it('takes the next text node when a label has no inline value', () => {
    expect(labelledValue(['Law School', 'University of Texas'], 'law\\s+school')).toBe('University of Texas');
    expect(labelledValue(['Law School: Baylor'], 'law\\s+school')).toBe('Baylor');
    expect(labelledValue(['Law School'], 'law\\s+school')).toBeNull();
  });
});

describe('findNextLocator', () => {
  it('resolves the first usable next link against the current page', () => {
    const $ = new ExtractionPipeline().load(`
      <a href="#">Next</a>
      <a href="javascript:void(0)">Next</a>
      <a href="results.cfm?page=3#top">Next &raquo;</a>`);

    expect(findNextLocator($, 'https://bar.example.org/dir/results.cfm?page=2'))
      .toBe('https://bar.example.org/dir/results.cfm?page=3');
  });

  it('returns null when there is no next link', () => {
    const $ = new ExtractionPipeline().load('<a href="/prev">Previous</a><a href="/nextdoor">Nextdoor</a>');

    expect(findNextLocator($, 'https://bar.example.org/')).toBeNull();
  });
});
