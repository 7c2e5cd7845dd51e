// bmp-js ships no type declarations
declare module 'bmp-js' {
  interface BmpImage {
    /** ABGR, four bytes per pixel, top row first */
    data: Buffer;
    width: number;
    height: number;
  }

  interface DecodedBmp extends BmpImage {
    bitPP: number;
    is_with_alpha: boolean;
  }

  const bmp: {
    decode(buffer: Buffer): DecodedBmp;
    encode(image: BmpImage, quality?: number): BmpImage;
  };

  export = bmp;
}
