/**
 * Denylists for the Idea layer of OOP sources: platform, UI and I/O
 * namespaces, and blocking or process-spawning API calls.
 */

export interface ForbiddenApi {
  rule: string;
  pattern: RegExp;
  description: string;
}

/** `Imports` statements (VB). */
export const FORBIDDEN_IMPORTS_VB: readonly ForbiddenApi[] = [
  {
    rule: 'ida-no-winforms',
    pattern: /^\s*Imports\s+System\.Windows\.Forms/i,
    description: 'Imports System.Windows.Forms (WinForms UI layer)',
  },
  {
    rule: 'ida-no-drawing',
    pattern: /^\s*Imports\s+System\.Drawing(?!\s*\.\s*Color\b)/i,
    description: 'Imports System.Drawing (Graphics API)',
  },
  {
    rule: 'ida-no-interop',
    pattern: /^\s*Imports\s+Microsoft\.Office\.Interop/i,
    description: 'Imports Microsoft.Office.Interop (COM Interop)',
  },
  {
    rule: 'ida-no-serialport',
    pattern: /^\s*Imports\s+System\.IO\.Ports/i,
    description: 'Imports System.IO.Ports (SerialPort/hardware)',
  },
  {
    rule: 'ida-no-fileio',
    pattern: /^\s*Imports\s+System\.IO\b/i,
    description: 'Imports System.IO (File I/O)',
  },
];

/** `using` directives (C#). */
export const FORBIDDEN_IMPORTS_CS: readonly ForbiddenApi[] = [
  {
    rule: 'ida-no-winforms',
    pattern: /^\s*using\s+System\.Windows\.Forms\s*;/i,
    description: 'using System.Windows.Forms (WinForms UI layer)',
  },
  {
    rule: 'ida-no-drawing',
    pattern: /^\s*using\s+System\.Drawing\s*;/i,
    description: 'using System.Drawing (Graphics API)',
  },
  {
    rule: 'ida-no-interop',
    pattern: /^\s*using\s+Microsoft\.Office\.Interop/i,
    description: 'using Microsoft.Office.Interop (COM Interop)',
  },
  {
    rule: 'ida-no-serialport',
    pattern: /^\s*using\s+System\.IO\.Ports\s*;/i,
    description: 'using System.IO.Ports (SerialPort/hardware)',
  },
  {
    rule: 'ida-no-fileio',
    pattern: /^\s*using\s+System\.IO\s*;/i,
    description: 'using System.IO (File I/O)',
  },
];

/** API calls, matched anywhere on a line in either dialect. */
export const FORBIDDEN_CALLS: readonly ForbiddenApi[] = [
  {
    rule: 'ida-no-messagebox',
    pattern: /\bMessageBox\.Show\s*\(/,
    description: 'MessageBox.Show (UI feedback must stay in prx_/poi_)',
  },
  {
    rule: 'ida-no-invoke',
    pattern: /\.(?:Begin)?Invoke\s*\(/,
    description: '.Invoke / .BeginInvoke (UI thread marshal)',
  },
  {
    rule: 'ida-no-threadsleep',
    pattern: /\bThread\.Sleep\s*\(/,
    description: 'Thread.Sleep (blocking delay; use timing abstraction)',
  },
  {
    rule: 'ida-no-processstart',
    pattern: /\bProcess\.Start\s*\(/,
    description: 'Process.Start (OS shell call)',
  },
];

/**
 * Import denylist for a file extension: VB for `.vb`, C# otherwise.
 */
export function importDenylistFor(extension: string): readonly ForbiddenApi[] {
  return extension.toLowerCase() === '.vb' ? FORBIDDEN_IMPORTS_VB : FORBIDDEN_IMPORTS_CS;
}
