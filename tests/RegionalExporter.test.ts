import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  groupNameFromFile,
  RegionalExporter,
  regionalFileName,
} from '../src/core/RegionalExporter.js';
import { makeTempDir, readText, removeDir } from './helpers.js';

describe('regional file names', () => {
  it('derives a file name from the group name', () => {
    expect(regionalFileName('TRFs')).toBe('dados_saude_TRFs.csv');
    expect(regionalFileName('Sul/Sudeste')).toBe('dados_saude_Sul_Sudeste.csv');
  });

  it('recovers the group name from a file name', () => {
    expect(groupNameFromFile('dados_saude_NE.csv')).toBe('NE');
    expect(groupNameFromFile('/out/dados_saude_TRFs.csv')).toBe('TRFs');
  });
});

describe('RegionalExporter', () => {
  let dir: string;
  let exporter: RegionalExporter;

  beforeEach(() => {
    dir = makeTempDir();
    exporter = new RegionalExporter(path.join(dir, 'regional'), ';');
  });

  afterEach(() => removeDir(dir));

  it('writes appended rows and overwrites a previous export on commit', async () => {
    const columns = ['Processo', 'Codigos assuntos'];
    const first = exporter.begin('NE', columns);
    await first.append([
      { Processo: '1', 'Codigos assuntos': '12480' },
      { Processo: '2', 'Codigos assuntos': '12481' },
    ]);
    await first.commit();

    const second = exporter.begin('NE', columns);
    await second.append([{ Processo: '3', 'Codigos assuntos': '12482' }]);
    await second.append([]);
    await second.append([{ Processo: '4' }]);
    const written = await second.commit();

    expect(written).toEqual({ groupName: 'NE', file: path.join(dir, 'regional', 'dados_saude_NE.csv') });
    expect(second.rowCount).toBe(2);
    expect(readText(written.file)).toBe('Processo;Codigos assuntos\n3;12482\n4;\n');
    expect(fs.readdirSync(path.join(dir, 'regional'))).toEqual(['dados_saude_NE.csv']);
  });

  it('leaves the previous export in place until commit', async () => {
    const first = exporter.begin('NE', ['Processo']);
    await first.append([{ Processo: '1' }]);
    const { file } = await first.commit();

    const pending = exporter.begin('NE', ['Processo']);
    await pending.append([{ Processo: '2' }]);
    expect(readText(file)).toBe('Processo\n1\n');

    await pending.discard();
    expect(readText(file)).toBe('Processo\n1\n');
    expect(fs.readdirSync(path.join(dir, 'regional'))).toEqual(['dados_saude_NE.csv']);
  });

  it('writes a header-only file for a group with no retained rows', async () => {
    const { file } = await exporter.begin('CO', ['Processo']).commit();

    expect(readText(file)).toBe('Processo\n');
  });

  it('prunes exports of groups not exported in this batch', async () => {
    for (const group of ['CO', 'NE', 'SU']) {
      await exporter.begin(group, ['Processo']).commit();
    }
    fs.writeFileSync(path.join(dir, 'regional', 'notes.txt'), 'kept');

    const removed = await exporter.prune(['NE']);

    expect(removed).toEqual([
      path.join(dir, 'regional', 'dados_saude_CO.csv'),
      path.join(dir, 'regional', 'dados_saude_SU.csv'),
    ]);
    expect(fs.readdirSync(path.join(dir, 'regional')).sort()).toEqual(['dados_saude_NE.csv', 'notes.txt']);
    await expect(exporter.prune(['NE'])).resolves.toEqual([]);
  });

  it('prunes nothing when the regional directory does not exist', async () => {
    await expect(exporter.prune([])).resolves.toEqual([]);
  });
});
