/**
 * Encodes a document URL as a Graph sharing token: `u!` followed by the
 * base64url form of the URL with the trailing `=` padding removed.
 *
 * The token is used to address the item as `/shares/{token}/driveItem`.
 */
export function encodeSharingToken(url: string): string {
  return `u!${Buffer.from(url, "utf8").toString("base64url")}`;
}
