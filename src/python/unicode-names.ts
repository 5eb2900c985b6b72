import fs from 'node:fs';
import path from 'node:path';

// One `HEX;NAME` line per named character, plus the control-character
// aliases Python accepts in `\N{...}`. Ideograph names are computed below.
const namesFile = path.resolve(__dirname, '..', '..', 'data', 'unicode-names.txt');

const algorithmicNames: Array<{ prefix: string; ranges: Array<[number, number]> }> = [
  {
    prefix: 'CJK UNIFIED IDEOGRAPH-',
    ranges: [
      [0x3400, 0x4dbf],
      [0x4e00, 0x9fff],
      [0x20000, 0x2a6df],
      [0x2a700, 0x2b738],
      [0x2b740, 0x2b81d],
      [0x2b820, 0x2cea1],
      [0x2ceb0, 0x2ebe0],
      [0x30000, 0x3134a],
    ],
  },
  {
    prefix: 'CJK COMPATIBILITY IDEOGRAPH-',
    ranges: [
      [0xf900, 0xfa6d],
      [0xfa70, 0xfad9],
      [0x2f800, 0x2fa1d],
    ],
  },
  { prefix: 'KHITAN SMALL SCRIPT CHARACTER-', ranges: [[0x18b00, 0x18cd5]] },
  { prefix: 'NUSHU CHARACTER-', ranges: [[0x1b170, 0x1b2fb]] },
];

let table: Map<string, number> | null = null;

function loadTable(): Map<string, number> {
  if (table) return table;
  const loaded = new Map<string, number>();
  for (const line of fs.readFileSync(namesFile, 'utf8').split('\n')) {
    const separator = line.indexOf(';');
    if (separator === -1) continue;
    loaded.set(line.slice(separator + 1), Number.parseInt(line.slice(0, separator), 16));
  }
  table = loaded;
  return loaded;
}

/** Code point of a Unicode character name, case-insensitively, or `undefined`. */
export function lookupCharacterName(name: string): number | undefined {
  const key = name.toUpperCase();
  for (const { prefix, ranges } of algorithmicNames) {
    if (!key.startsWith(prefix)) continue;
    const hex = key.slice(prefix.length);
    if (!/^[0-9A-F]{4,5}$/.test(hex)) return undefined;
    const code = Number.parseInt(hex, 16);
    return ranges.some(([first, last]) => code >= first && code <= last) ? code : undefined;
  }
  return loadTable().get(key);
}
