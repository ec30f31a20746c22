import {
  findDisagreements,
  findDisallowed,
  FormatReport,
  groupByFormat,
} from '../../src/backend/services/inspectionService';
import {
  formatFormatReport,
  formatGenres,
  formatListingInspection,
  formatPrice,
  formatStatus,
  formatSummaryLines,
  formatVerdictLine,
  RULE,
} from '../../src/backend/utils/formatting';
import { Listing, MasterVersion } from '../../src/shared/types';

const listing: Listing = {
  listingId: 501,
  releaseId: 1,
  title: 'Alpha',
  artist: 'Artist A',
  format: 'LP',
  condition: 'Mint (M)',
  sleeveCondition: 'Near Mint (NM or M-)',
  price: { value: 25, currency: 'USD' },
};

describe('formatting', () => {
  describe('formatPrice', () => {
    it('should print two decimals and the currency', () => {
      expect(formatPrice({ value: 25, currency: 'USD' })).toBe('25.00 USD');
      expect(formatPrice({ value: 12.5, currency: 'EUR' })).toBe('12.50 EUR');
    });

    it('should drop missing parts', () => {
      expect(formatPrice({ value: 3, currency: '' })).toBe('3.00');
      expect(formatPrice({ value: null, currency: 'USD' })).toBe('USD');
      expect(formatPrice({ value: null, currency: '' })).toBe('n/a');
    });
  });

  describe('formatGenres', () => {
    it('should join genres or print Unknown', () => {
      expect(formatGenres(['Electronic', 'Pop'])).toBe('Electronic, Pop');
      expect(formatGenres([])).toBe('Unknown');
    });
  });

  describe('formatStatus', () => {
    it('should mark passes and failures', () => {
      const detail = { versionCount: 2, genres: [], releaseId: 1 };
      expect(
        formatStatus({ outcome: 'pass', reason: 'no master release', ...detail })
      ).toBe('✓ VINYL-ONLY (no master release)');
      expect(
        formatStatus({
          outcome: 'fail',
          reason: 'has non-vinyl (2 versions)',
          ...detail,
        })
      ).toBe('✗ has non-vinyl (2 versions)');
    });
  });

  describe('formatVerdictLine', () => {
    it('should join the result fields with pipes', () => {
      const line = formatVerdictLine(4, listing, {
        outcome: 'pass',
        reason: '3 versions, vinyl/cassette only',
        versionCount: 3,
        genres: ['Electronic'],
        releaseId: 1,
      });

      expect(line).toBe(
        '[4] ✓ VINYL-ONLY (3 versions, vinyl/cassette only) | Electronic | Artist A - Alpha | 25.00 USD | https://www.discogs.com/release/1'
      );
    });
  });

  describe('formatSummaryLines', () => {
    it('should print the totals after a rule', () => {
      expect(
        formatSummaryLines({
          seller: 'shop',
          genreFilter: 'Electronic',
          listingsSeen: 120,
          checked: 14,
          vinylOnly: 3,
        })
      ).toEqual([
        '',
        RULE,
        'Total: 120 fetched, 14 matched filters, 3 vinyl-only',
      ]);
      expect(RULE).toHaveLength(80);
    });
  });

  describe('formatListingInspection', () => {
    it('should print release and master details', () => {
      const lines = formatListingInspection(
        {
          listing,
          release: {
            id: 1,
            master_id: 10,
            genres: ['Electronic'],
            styles: [],
            formats: [{ name: 'Vinyl', descriptions: ['LP', 'Album'] }],
          },
          releaseStatus: 200,
          masterId: 10,
          master: { id: 10, genres: ['Electronic'], styles: ['Techno'] },
          masterStatus: 200,
        },
        1
      );

      expect(lines).toEqual([
        RULE,
        'ENTRY #1',
        RULE,
        'Title:       Alpha',
        'Artist:      Artist A',
        'Release ID:  1',
        'Format:      LP',
        'Genres:      Electronic',
        'Styles:      (none)',
        'Formats:     Vinyl (LP, Album)',
        'Master ID:   10',
        '  Genres:    Electronic',
        '  Styles:    Techno',
        'Price:       25.00 USD',
        'Condition:   Mint (M) / Near Mint (NM or M-)',
        'URL:         https://www.discogs.com/release/1',
        '',
      ]);
    });

    it('should note a failed master lookup with its status', () => {
      const lines = formatListingInspection(
        {
          listing,
          release: { id: 1, master_id: 10 },
          releaseStatus: 200,
          masterId: 10,
          master: null,
          masterStatus: 503,
        },
        2
      );

      expect(lines).toContain('Master ID:   10 (lookup failed: HTTP 503)');
      expect(lines).toContain('Formats:     (none)');
    });

    it('should note a failed release lookup with its status', () => {
      const lines = formatListingInspection(
        {
          listing,
          release: null,
          releaseStatus: 503,
          masterId: null,
          master: null,
          masterStatus: null,
        },
        2
      );

      expect(lines.slice(3, 9)).toEqual([
        'Title:       Alpha',
        'Artist:      Artist A',
        'Release ID:  1',
        'Format:      LP',
        'Release:     (lookup failed: HTTP 503)',
        'Price:       25.00 USD',
      ]);
    });

    it('should omit release details when the listing has no release id', () => {
      const lines = formatListingInspection(
        {
          listing: {
            ...listing,
            releaseId: null,
            format: '',
            price: { value: null, currency: '' },
          },
          release: null,
          releaseStatus: null,
          masterId: null,
          master: null,
          masterStatus: null,
        },
        3
      );

      expect(lines).toEqual([
        RULE,
        'ENTRY #3',
        RULE,
        'Title:       Alpha',
        'Artist:      Artist A',
        'Release ID:  Unknown',
        'Format:      Not specified',
        'Price:       n/a',
        'Condition:   Mint (M) / Near Mint (NM or M-)',
        '',
      ]);
    });
  });

  describe('formatFormatReport', () => {
    function buildReport(versions: MasterVersion[]): FormatReport {
      const disallowed = findDisallowed(versions);
      return {
        release: {
          id: 1,
          title: 'Zeta',
          master_id: 5,
          artists: [{ name: 'Artist Z' }],
        },
        masterId: 5,
        versions,
        formatGroups: groupByFormat(versions),
        disallowed,
        disagreements: findDisagreements(versions),
        vinylOnly: disallowed.length === 0,
      };
    }

    it('should explain a release without a master', () => {
      const lines = formatFormatReport({
        release: { id: 7, title: 'Solo' },
        masterId: null,
        versions: [],
        formatGroups: [],
        disallowed: [],
        disagreements: [],
        vinylOnly: true,
      });

      expect(lines).toEqual([
        'Release: Solo',
        'Artist: Unknown',
        '',
        'No master release ID found. This release has no other versions.',
      ]);
    });

    it('should list versions, format groups and rule disagreements', () => {
      const lines = formatFormatReport(
        buildReport([
          {
            id: 1,
            title: 'Zeta',
            format: 'LP, Album',
            major_formats: ['Vinyl'],
            country: 'UK',
            released: '1990',
            label: 'Lbl',
            catno: 'L1',
          },
          {
            id: 2,
            title: 'Zeta',
            format: 'CD, Album',
            major_formats: ['CD'],
            country: 'US',
            released: '1991',
            label: 'Lbl',
            catno: 'L2',
          },
          {
            id: 3,
            title: 'Zeta',
            format: 'LP, File, MP3',
            major_formats: ['Vinyl'],
          },
        ])
      );

      expect(lines).toEqual([
        'Release: Zeta',
        'Artist: Artist Z',
        'Master ID: 5',
        'Found 3 versions',
        '',
        RULE,
        'ALL VERSIONS:',
        '',
        '[1] Zeta',
        '    Format: LP, Album (major: Vinyl)',
        '    Country: UK | Year: 1990',
        '    Label: Lbl (L1)',
        '    URL: https://www.discogs.com/release/1',
        '',
        '[2] Zeta',
        '    Format: CD, Album (major: CD)',
        '    Country: US | Year: 1991',
        '    Label: Lbl (L2)',
        '    URL: https://www.discogs.com/release/2',
        '',
        '[3] Zeta',
        '    Format: LP, File, MP3 (major: Vinyl)',
        '    Country: Unknown | Year: Unknown',
        '    Label: Unknown ()',
        '    URL: https://www.discogs.com/release/3',
        '',
        RULE,
        'FORMAT SUMMARY:',
        'CD, Album: 1 versions',
        'LP, Album: 1 versions',
        'LP, File, MP3: 1 versions',
        '',
        RULE,
        'FORMAT CHECK (major formats):',
        '✗ Found 1 versions with non-vinyl/non-cassette formats:',
        '  - Zeta: CD',
        '✗ This release HAS non-vinyl/non-cassette versions',
        '',
        'RULE DISAGREEMENTS (major formats vs. format text):',
        '  - Zeta [LP, File, MP3]: digital hint in format text only',
        '',
        'Total versions: 3',
        'Vinyl/Cassette only: 2',
        'Has other formats: 1',
      ]);
    });

    it('should dump each version as JSON when asked for raw output', () => {
      const lines = formatFormatReport(
        buildReport([{ id: 1, format: 'LP', major_formats: ['Vinyl'] }]),
        { raw: true }
      );

      const start = lines.indexOf('    URL: https://www.discogs.com/release/1');
      expect(lines.slice(start + 1, start + 10)).toEqual([
        '    Raw data:',
        '      {',
        '        "id": 1,',
        '        "format": "LP",',
        '        "major_formats": [',
        '          "Vinyl"',
        '        ]',
        '      }',
        '',
      ]);
    });

    it('should leave raw records out by default', () => {
      const lines = formatFormatReport(
        buildReport([{ id: 1, format: 'LP', major_formats: ['Vinyl'] }])
      );

      expect(lines).not.toContain('    Raw data:');
    });

    it('should truncate long lists of offending versions', () => {
      const versions: MasterVersion[] = Array.from({ length: 12 }, (_, i) => ({
        id: i + 1,
        title: `Issue ${i + 1}`,
        format: 'CD',
        major_formats: ['CD'],
      }));

      const lines = formatFormatReport(buildReport(versions));

      expect(lines).toContain('  - Issue 10: CD');
      expect(lines).not.toContain('  - Issue 11: CD');
      expect(lines).toContain('  ... and 2 more');
    });

    it('should confirm a vinyl/cassette-only release', () => {
      const lines = formatFormatReport(
        buildReport([
          { id: 1, format: 'LP', major_formats: ['Vinyl'] },
          { id: 2, format: 'Cass', major_formats: ['Cassette'] },
        ])
      );

      expect(lines).toContain(
        '✓ No non-vinyl/non-cassette formats found - this is VINYL/CASSETTE-ONLY'
      );
      expect(lines).toContain('Has other formats: 0');
    });
  });
});
