import {
  systemInterpreterNames,
  targetScriptPath,
  venvInterpreterPath,
} from '../../../src/launcher/paths.js';

describe('venvInterpreterPath', () => {
  it('uses bin/python outside Windows', () => {
    expect(venvInterpreterPath('/opt/qgraphic', '.venv', 'linux')).toBe('/opt/qgraphic/.venv/bin/python');
    expect(venvInterpreterPath('/opt/qgraphic', '.venv', 'darwin')).toBe('/opt/qgraphic/.venv/bin/python');
  });

  it('uses Scripts\\python.exe on Windows', () => {
    expect(venvInterpreterPath('C:\\qgraphic', '.venv', 'win32')).toBe('C:\\qgraphic\\.venv\\Scripts\\python.exe');
  });

  it('honours a custom venv directory', () => {
    expect(venvInterpreterPath('/opt/qgraphic', 'env', 'linux')).toBe('/opt/qgraphic/env/bin/python');
  });
});

describe('targetScriptPath', () => {
  it('places qgraphic.py in the home directory', () => {
    expect(targetScriptPath('/opt/qgraphic', 'linux')).toBe('/opt/qgraphic/qgraphic.py');
    expect(targetScriptPath('C:\\qgraphic', 'win32')).toBe('C:\\qgraphic\\qgraphic.py');
  });
});

describe('systemInterpreterNames', () => {
  it('tries python3 before python outside Windows', () => {
    expect(systemInterpreterNames('linux')).toEqual(['python3', 'python']);
  });

  it('tries python on Windows', () => {
    expect(systemInterpreterNames('win32')).toEqual(['python']);
  });
});
