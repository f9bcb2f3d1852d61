import { DelimitedTextError, detectDelimiter, parseDelimitedTable } from './delimited-text';

describe('parseDelimitedTable', () => {
    it('should parse tab-delimited tables', () => {
        const text = 'id\tlatitude\tlongitude\nCA\t38.58\t-121.49\nTX\t30.27\t-97.74\n';

        expect(parseDelimitedTable(text, ['id', 'latitude', 'longitude'])).toEqual([
            { id: 'CA', latitude: '38.58', longitude: '-121.49' },
            { id: 'TX', latitude: '30.27', longitude: '-97.74' },
        ]);
    });

    it('should keep multi-word names in the last whitespace column', () => {
        const text = 'id display_name\nUT   Salt Lake City\nMO Jefferson City';

        expect(parseDelimitedTable(text, ['id', 'display_name'])).toEqual([
            { id: 'UT', display_name: 'Salt Lake City' },
            { id: 'MO', display_name: 'Jefferson City' },
        ]);
    });

    it('should honour quoted commas', () => {
        const text = 'id,display_name\r\n"DC","Washington, D.C."\r\nNY,"Albany ""the capital"""';

        expect(parseDelimitedTable(text, ['id', 'display_name'])).toEqual([
            { id: 'DC', display_name: 'Washington, D.C.' },
            { id: 'NY', display_name: 'Albany "the capital"' },
        ]);
    });

    it('should lower-case headers and skip blank and comment lines', () => {
        const text = '# capitals\n\nID\tDisplay_Name\n\nCA\tSacramento\n';

        expect(parseDelimitedTable(text, ['id', 'display_name'])).toEqual([
            { id: 'CA', display_name: 'Sacramento' },
        ]);
    });

    it('should reject an empty table', () => {
        expect(() => parseDelimitedTable('\n# nothing\n', ['id'])).toThrow('table is empty');
    });

    it('should reject a header missing required columns', () => {
        expect(() => parseDelimitedTable('id\tlat\nCA\t38.58', ['id', 'latitude', 'longitude']))
            .toThrow('line 1: missing column(s): latitude, longitude');
    });

    it('should reject short rows with their line number', () => {
        const text = 'id\tlatitude\tlongitude\nCA\t38.58\n';

        expect(() => parseDelimitedTable(text, ['id'])).toThrow(DelimitedTextError);
        expect(() => parseDelimitedTable(text, ['id'])).toThrow('line 2: expected 3 cells, found 2');
    });

    it('should drop skipped ids before checking row width', () => {
        const text = 'id latitude longitude\nCA 38.58 -121.49\nUS\n';

        const rows = parseDelimitedTable(text, ['id'], { skip: { column: 'id', values: new Set(['US']) } });

        expect(rows).toEqual([{ id: 'CA', latitude: '38.58', longitude: '-121.49' }]);
    });

    it('should still reject short rows that are not skipped', () => {
        const text = 'id latitude longitude\nCA 38.58 -121.49\nNY\n';

        expect(() => parseDelimitedTable(text, ['id'], { skip: { column: 'id', values: new Set(['US']) } }))
            .toThrow('line 3: expected 3 cells, found 1');
    });
});

describe('detectDelimiter', () => {
    it('should prefer tab over comma', () => {
        expect(detectDelimiter('id\tname,alt')).toBe('tab');
        expect(detectDelimiter('id,name')).toBe('comma');
        expect(detectDelimiter('id  name')).toBe('whitespace');
    });
});
