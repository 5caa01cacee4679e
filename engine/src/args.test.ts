import { parseArgs } from './args';

describe('parseArgs', () => {
  it('should join positional words into the prompt', () => {
    expect(parseArgs(['a', 'todo', 'app'])).toEqual({ prompt: 'a todo app', outDir: 'generated', help: false });
  });

  it('should read options anywhere in the line', () => {
    expect(parseArgs(['--out', 'build/site', 'blog', '--save-state', 'state.json', 'engine'])).toEqual({
      prompt: 'blog engine',
      outDir: 'build/site',
      saveState: 'state.json',
      help: false,
    });
  });

  it('should reject unknown options and missing values', () => {
    expect(() => parseArgs(['--fast', 'x'])).toThrow('Unknown option: --fast');
    expect(() => parseArgs(['x', '--out'])).toThrow('Missing value for --out');
  });

  it('should recognise help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
  });
});
