import fs from 'node:fs';

const NPY_MAGIC = Buffer.from([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]);
const PREAMBLE_BYTES = 12;

type NpyDtype = 'f4' | 'f8' | 'i1' | 'u1' | 'i2' | 'i4' | 'i8';

const DTYPE_SIZES: Record<NpyDtype, number> = { f4: 4, f8: 8, i1: 1, u1: 1, i2: 2, i4: 4, i8: 8 };

const DTYPE_READERS: Record<NpyDtype, (buffer: Buffer, offset: number) => number> = {
  f4: (buffer, offset) => buffer.readFloatLE(offset),
  f8: (buffer, offset) => buffer.readDoubleLE(offset),
  i1: (buffer, offset) => buffer.readInt8(offset),
  u1: (buffer, offset) => buffer.readUInt8(offset),
  i2: (buffer, offset) => buffer.readInt16LE(offset),
  i4: (buffer, offset) => buffer.readInt32LE(offset),
  i8: (buffer, offset) => Number(buffer.readBigInt64LE(offset)),
};

export interface NpyHeader {
  dtype: NpyDtype;
  itemSize: number;
  shape: number[];
  dataOffset: number;
}

const isNpyDtype = (value: string): value is NpyDtype => Object.prototype.hasOwnProperty.call(DTYPE_SIZES, value);

const parseDescr = (descr: string, filePath: string): NpyDtype => {
  const match = descr.match(/^([<|=])([fiu]\d)$/);
  if (!match || !isNpyDtype(match[2])) {
    throw new Error(`${filePath}: unsupported dtype '${descr}'. Expected little-endian f4, f8, i1, u1, i2, i4 or i8.`);
  }
  const dtype = match[2];
  if (match[1] === '|' && DTYPE_SIZES[dtype] !== 1) {
    throw new Error(`${filePath}: dtype '${descr}' has no byte order.`);
  }
  return dtype;
};

const parseNpyHeader = (preamble: Buffer, readHeaderText: (offset: number, length: number) => string, filePath: string): NpyHeader => {
  if (preamble.length < 10 || !preamble.subarray(0, 6).equals(NPY_MAGIC)) {
    throw new Error(`${filePath}: not an .npy file.`);
  }
  const major = preamble.readUInt8(6);
  let headerLength: number;
  let headerStart: number;
  if (major === 1) {
    headerLength = preamble.readUInt16LE(8);
    headerStart = 10;
  } else if (major === 2 || major === 3) {
    headerLength = preamble.readUInt32LE(8);
    headerStart = 12;
  } else {
    throw new Error(`${filePath}: unsupported .npy version ${major}.`);
  }

  const header = readHeaderText(headerStart, headerLength);
  const descr = header.match(/'descr':\s*'([^']+)'/)?.[1];
  const fortranOrder = header.match(/'fortran_order':\s*(True|False)/)?.[1];
  const shapeText = header.match(/'shape':\s*\(([^)]*)\)/)?.[1];
  if (!descr || !fortranOrder || shapeText === undefined) {
    throw new Error(`${filePath}: malformed .npy header.`);
  }
  if (fortranOrder === 'True') {
    throw new Error(`${filePath}: Fortran-ordered arrays are not supported.`);
  }

  const shape = shapeText
    .split(',')
    .map((dim) => dim.trim())
    .filter(Boolean)
    .map(Number);
  if (shape.some((dim) => !Number.isInteger(dim) || dim < 0)) {
    throw new Error(`${filePath}: malformed shape (${shapeText}).`);
  }

  const dtype = parseDescr(descr, filePath);
  return { dtype, itemSize: DTYPE_SIZES[dtype], shape, dataOffset: headerStart + headerLength };
};

const readHeader = (fd: number, filePath: string): NpyHeader => {
  const preamble = Buffer.alloc(PREAMBLE_BYTES);
  const bytesRead = fs.readSync(fd, preamble, 0, PREAMBLE_BYTES, 0);
  return parseNpyHeader(preamble.subarray(0, bytesRead), (offset, length) => {
    const text = Buffer.alloc(length);
    fs.readSync(fd, text, 0, length, offset);
    return text.toString('latin1');
  }, filePath);
};

const flatIndex = (shape: number[], indices: number[], filePath: string): number => {
  if (indices.length !== shape.length) {
    throw new Error(`${filePath}: expected ${shape.length} indices, got ${indices.length}.`);
  }
  let flat = 0;
  for (let axis = 0; axis < shape.length; axis += 1) {
    const index = indices[axis];
    if (!Number.isInteger(index) || index < 0 || index >= shape[axis]) {
      throw new Error(`${filePath}: index ${index} out of bounds for axis ${axis} of size ${shape[axis]}.`);
    }
    flat = flat * shape[axis] + index;
  }
  return flat;
};

export interface NpyCellRead {
  shape: number[];
  value: number;
}

// Reads a single element without loading the array.
export const readNpyCell = (filePath: string, indices: number[]): NpyCellRead => {
  const fd = fs.openSync(filePath, 'r');
  try {
    const header = readHeader(fd, filePath);
    const offset = header.dataOffset + flatIndex(header.shape, indices, filePath) * header.itemSize;
    const cell = Buffer.alloc(header.itemSize);
    const bytesRead = fs.readSync(fd, cell, 0, header.itemSize, offset);
    if (bytesRead !== header.itemSize) {
      throw new Error(`${filePath}: truncated data at byte ${offset}.`);
    }
    return { shape: header.shape, value: DTYPE_READERS[header.dtype](cell, 0) };
  } finally {
    fs.closeSync(fd);
  }
};

export interface NpyArray {
  shape: number[];
  data: number[];
}

export const readNpyArray = (filePath: string): NpyArray => {
  const fd = fs.openSync(filePath, 'r');
  try {
    const header = readHeader(fd, filePath);
    const count = header.shape.reduce((total, dim) => total * dim, 1);
    const body = Buffer.alloc(count * header.itemSize);
    const bytesRead = fs.readSync(fd, body, 0, body.length, header.dataOffset);
    if (bytesRead !== body.length) {
      throw new Error(`${filePath}: expected ${body.length} data bytes, found ${bytesRead}.`);
    }
    const read = DTYPE_READERS[header.dtype];
    const data = Array.from({ length: count }, (_, idx) => read(body, idx * header.itemSize));
    return { shape: header.shape, data };
  } finally {
    fs.closeSync(fd);
  }
};
