import * as QRCode from "qrcode";

/* 誤り訂正 L / 余白 4 モジュール / 白地に黒 */
const QR_OPTIONS: QRCode.QRCodeToDataURLOptions = {
  type: "image/png",
  errorCorrectionLevel: "L",
  margin: 4,
  scale: 8,
  color: { dark: "#000000", light: "#ffffff" },
};

/** URL を QR の PNG にして data URI で返す（同じ URL なら同じバイト列） */
export async function generateQrDataUri(url: string): Promise<string> {
  return await QRCode.toDataURL(url, QR_OPTIONS);
}

export function dataUriBytes(dataUri: string): Buffer {
  const i = dataUri.indexOf(",");
  return Buffer.from(i >= 0 ? dataUri.slice(i + 1) : "", "base64");
}
