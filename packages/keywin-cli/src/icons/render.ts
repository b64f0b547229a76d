import type { KeyImage } from "keywin";
import sharp from "sharp";

const BLACK = { r: 0, g: 0, b: 0, alpha: 1 };

/** Scale an image file into a key-sized, black-backed raw RGB bitmap. */
export async function renderKeyImage(file: string, width: number, height: number): Promise<KeyImage> {
    const { data, info } = await sharp(file)
        .resize(width, height, { fit: "contain", background: BLACK })
        .flatten({ background: BLACK })
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, data };
}
