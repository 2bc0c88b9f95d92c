import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GRAPH_FILE_NAME, runSimulationCli } from '../../cli/simulate';

describe('runSimulationCli', () => {
  let tmpDir: string;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'forex-cli-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeInput(name: string, content: string): string {
    const inputPath = path.join(tmpDir, name);
    fs.writeFileSync(inputPath, content, 'utf-8');
    return inputPath;
  }

  it('should write the chart and exit 0 for valid input', () => {
    const inputPath = writeInput('input.json', JSON.stringify({ budget: 5000 }));
    const outputDir = path.join(tmpDir, 'graphs');

    expect(runSimulationCli([inputPath, outputDir])).toBe(0);
    expect(fs.existsSync(path.join(outputDir, GRAPH_FILE_NAME))).toBe(true);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should exit 1 when the input file is missing', () => {
    const inputPath = path.join(tmpDir, 'missing.json');

    expect(runSimulationCli([inputPath, tmpDir])).toBe(1);
    const message: string = errorSpy.mock.calls[0][0];
    expect(message.startsWith(`Failed to read or parse input file "${inputPath}": `)).toBe(true);
  });

  it('should exit 1 when the input file is not JSON', () => {
    const inputPath = writeInput('broken.json', '{"budget": 100000,');

    expect(runSimulationCli([inputPath, tmpDir])).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should exit 1 when the input is not an object', () => {
    const inputPath = writeInput('array.json', '[1, 2]');

    expect(runSimulationCli([inputPath, tmpDir])).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('Input file must contain a JSON object with simulation inputs.');
  });

  it('should exit 1 and list issues when validation fails', () => {
    const inputPath = writeInput('invalid.json', JSON.stringify({ budget: 0, rateRange: { min: 85, max: 60 } }));
    const outputDir = path.join(tmpDir, 'graphs');

    expect(runSimulationCli([inputPath, outputDir])).toBe(1);
    expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
      'Invalid simulation inputs:',
      '  - budget: must be greater than 0',
      '  - rateRange.min: min must not exceed max',
    ]);
    expect(fs.existsSync(outputDir)).toBe(false);
  });
});
