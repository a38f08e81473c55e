import { parseDocuments } from './parse-documents';

describe('parseDocuments', () => {
  it('parses a valid export', () => {
    const documents = parseDocuments(
      JSON.stringify([
        { text: 'Prosaro PHI 35 days', source: 'fis', chemical: 'Prosaro', phiDays: 35 },
        { text: 'Rotate crops yearly.' },
      ]),
    );

    expect(documents).toHaveLength(2);
    expect(documents[0].phiDays).toBe(35);
    expect(documents[1].text).toBe('Rotate crops yearly.');
  });

  it('rejects anything but an array', () => {
    expect(() => parseDocuments('{"text":"single"}')).toThrow('Expected a JSON array of documents');
  });

  it('lists invalid entries by position', () => {
    const raw = JSON.stringify([
      { text: 'fine' },
      { source: 'fis' },
      { text: 'negative interval', phiDays: -1 },
    ]);

    expect(() => parseDocuments(raw)).toThrow(/^Invalid documents:\n {2}- \[1\] text: /);
    expect(() => parseDocuments(raw)).toThrow(/\[2\] phiDays: phiDays must not be less than 0/);
  });

  it('rejects an unknown protection type', () => {
    expect(() =>
      parseDocuments(JSON.stringify([{ text: 'x', protectionType: 'acaricides' }])),
    ).toThrow(/\[0\] protectionType: /);
  });
});
