export const erase = {
  buffer: (b?: Buffer | null) => {
    if (b && Buffer.isBuffer(b)) b.fill(0);
  },
  buffers: (...buffers: (Buffer | null | undefined)[]) => {
    buffers.forEach(b => erase.buffer(b));
  }
};
