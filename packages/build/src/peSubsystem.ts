/**
 * Windows Subsystem
 *
 * Reads and rewrites the subsystem field of a PE executable's optional
 * header. GUI executables start without a console window.
 *
 * Only the two bytes of that field are written. Data appended after the
 * image (the packaged application) keeps its offsets.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { ExecutableFormatError } from '@fileclassify/core';

export const WINDOWS_SUBSYSTEM = {
  gui: 2,
  console: 3,
} as const;

export type WindowsSubsystem = keyof typeof WINDOWS_SUBSYSTEM;

const DOS_MAGIC = 0x5a4d; // "MZ"
const PE_SIGNATURE = 0x00004550; // "PE\0\0"
const PE_POINTER_OFFSET = 0x3c;
const COFF_HEADER_SIZE = 20;
const PE32_MAGIC = 0x10b;
const PE32_PLUS_MAGIC = 0x20b;
// Same position in PE32 and PE32+ optional headers
const SUBSYSTEM_OFFSET = 68;

async function readAt(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  const { bytesRead } = await handle.read(buffer, 0, length, position);
  return buffer.subarray(0, bytesRead);
}

/**
 * File offset of the subsystem field
 */
async function locateSubsystem(handle: FileHandle, filePath: string): Promise<number> {
  const dosHeader = await readAt(handle, 0, 64);
  if (dosHeader.length < 64 || dosHeader.readUInt16LE(0) !== DOS_MAGIC) {
    throw new ExecutableFormatError(filePath, 'missing MZ header');
  }

  const peOffset = dosHeader.readUInt32LE(PE_POINTER_OFFSET);
  const optionalHeaderOffset = peOffset + 4 + COFF_HEADER_SIZE;
  const fieldOffset = optionalHeaderOffset + SUBSYSTEM_OFFSET;

  const peHeader = await readAt(handle, peOffset, fieldOffset + 2 - peOffset);
  if (peHeader.length < fieldOffset + 2 - peOffset || peHeader.readUInt32LE(0) !== PE_SIGNATURE) {
    throw new ExecutableFormatError(filePath, 'missing PE signature');
  }

  const magic = peHeader.readUInt16LE(optionalHeaderOffset - peOffset);
  if (magic !== PE32_MAGIC && magic !== PE32_PLUS_MAGIC) {
    throw new ExecutableFormatError(filePath, `unknown optional header magic 0x${magic.toString(16)}`);
  }

  return fieldOffset;
}

/**
 * Current subsystem value of an executable
 */
export async function readWindowsSubsystem(filePath: string): Promise<number> {
  const handle = await open(filePath, 'r');
  try {
    const fieldOffset = await locateSubsystem(handle, filePath);
    return (await readAt(handle, fieldOffset, 2)).readUInt16LE(0);
  } finally {
    await handle.close();
  }
}

/**
 * Rewrite the subsystem of an executable in place
 */
export async function setWindowsSubsystem(filePath: string, subsystem: WindowsSubsystem): Promise<void> {
  const handle = await open(filePath, 'r+');
  try {
    const fieldOffset = await locateSubsystem(handle, filePath);
    const value = Buffer.alloc(2);
    value.writeUInt16LE(WINDOWS_SUBSYSTEM[subsystem], 0);
    await handle.write(value, 0, 2, fieldOffset);
  } finally {
    await handle.close();
  }
}
