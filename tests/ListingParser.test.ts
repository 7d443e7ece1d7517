import {
  parseListing,
  parseArchiveLine,
  parseListingTimestamp,
  archiveBaseName,
  InvalidListingLineError,
} from '../src/listing/ListingParser';

describe('ListingParser', () => {
  describe('parseListing', () => {
    it('should return no families for an empty listing', () => {
      expect(parseListing('')).toEqual(new Map());
    });

    it('should group archives by base name in input order', () => {
      const families = parseListing(
        'foo\t2000-01-01 00:00:00\n' +
          'foo-123\t1999-02-02 03:00:00\n' +
          'bar-123\t1999-02-02 03:00:00\n'
      );

      expect(families).toEqual(
        new Map([
          [
            'foo',
            [
              { name: 'foo', timestamp: new Date('2000-01-01T00:00:00Z') },
              { name: 'foo-123', timestamp: new Date('1999-02-02T03:00:00Z') },
            ],
          ],
          ['bar', [{ name: 'bar-123', timestamp: new Date('1999-02-02T03:00:00Z') }]],
        ])
      );
      expect([...families.keys()]).toEqual(['foo', 'bar']);
    });

    it('should accept a listing without a trailing newline', () => {
      const families = parseListing('daily-20200101\t2020-01-01 04:00:00');

      expect(families.get('daily')).toEqual([
        { name: 'daily-20200101', timestamp: new Date('2020-01-01T04:00:00Z') },
      ]);
    });

    it('should accept CRLF line endings', () => {
      const families = parseListing('a-1\t2020-01-01 00:00:00\r\na-2\t2020-01-02 00:00:00\r\n');

      expect(families.get('a')?.map(archive => archive.name)).toEqual(['a-1', 'a-2']);
    });

    it('should reject a lone newline', () => {
      expect(() => parseListing('\n')).toThrow(InvalidListingLineError);
    });

    it('should reject a line with an unparseable timestamp', () => {
      expect(() => parseListing('foo\tbar')).toThrow(InvalidListingLineError);
    });

    it('should fail the whole listing on one bad line', () => {
      expect(() =>
        parseListing('good-1\t2020-01-01 00:00:00\nbad line\ngood-2\t2020-01-02 00:00:00\n')
      ).toThrow("failed to parse line 'bad line': expected 2 tab-separated fields, got 1");
    });

    it('should keep years below 100 as written', () => {
      const families = parseListing('a-1\t0099-12-31 23:59:59\n');

      expect([...families.keys()]).toEqual(['a']);
      expect(families.get('a')?.map(archive => archive.timestamp.toISOString())).toEqual([
        '0099-12-31T23:59:59.000Z',
      ]);
    });
  });

  describe('parseArchiveLine', () => {
    it('should parse name and UTC timestamp', () => {
      expect(parseArchiveLine('host-2020-06-01\t2020-06-01 12:34:56')).toEqual({
        name: 'host-2020-06-01',
        timestamp: new Date('2020-06-01T12:34:56Z'),
      });
    });

    it('should carry the offending line on the error', () => {
      let caught: unknown;
      try {
        parseArchiveLine('a\tb\tc');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidListingLineError);
      expect(caught).toMatchObject({ line: 'a\tb\tc', operation: 'listing' });
    });

    it('should report an invalid timestamp', () => {
      expect(() => parseArchiveLine('foo\t2020-02-30 00:00:00')).toThrow(
        "failed to parse line 'foo\t2020-02-30 00:00:00': invalid timestamp '2020-02-30 00:00:00'"
      );
    });
  });

  describe('parseListingTimestamp', () => {
    it('should parse as UTC', () => {
      expect(parseListingTimestamp('2008-12-29 03:04:05')?.toISOString()).toBe(
        '2008-12-29T03:04:05.000Z'
      );
    });

    it.each([
      '2020-13-01 00:00:00',
      '2019-02-29 00:00:00',
      '2020-01-01 24:00:00',
      '2020-01-01 00:60:00',
      '0100-02-29 00:00:00',
      '2020-01-01T00:00:00',
      '2020-01-01',
      '2020-1-1 0:0:0',
      '',
    ])('should reject %p', text => {
      expect(parseListingTimestamp(text)).toBeNull();
    });

    it('should parse a year below 100 without shifting the century', () => {
      expect(parseListingTimestamp('0050-06-01 00:00:00')?.toISOString()).toBe(
        '0050-06-01T00:00:00.000Z'
      );
    });

    it('should accept a leap day', () => {
      expect(parseListingTimestamp('2020-02-29 23:59:59')?.toISOString()).toBe(
        '2020-02-29T23:59:59.000Z'
      );
    });
  });

  describe('archiveBaseName', () => {
    it.each([
      ['name-20200101-1200', 'name'],
      ['foo', 'foo'],
      ['foo-123', 'foo'],
      ['foo-bar-123', 'foo-bar'],
      ['foo-bar', 'foo-bar'],
      ['foo-', 'foo'],
      ['foo-12a', 'foo-12a'],
      ['db.daily-2020-01-01_1200', 'db.daily-2020-01-01_1200'],
    ])('should map %p to %p', (name, expected) => {
      expect(archiveBaseName(name)).toBe(expected);
    });
  });
});
