/**
 * Synthetic JAERO format-3 records shared by the tests.
 */

export const HEADER_1 = '00:16:25 18-03-25 UTC';
export const HEADER_2 = '00:17:01 18-03-25 UTC';
export const HEADER_3 = '00:18:30 18-03-25 UTC';
export const HEADER_4 = '00:19:45 18-03-25 UTC';

/** label 52, tail PT-ZNG */
export const MESSAGE_1 = `${HEADER_1} AES:E4920F GES:D0 2 .PT-ZNG ! 52 A\nPOSITION REPORT ONE\n`;
/** label H1, tail TEST01 */
export const MESSAGE_2 = `${HEADER_2} AES:ABC123 GES:50 1 TEST01 ! H1 B\nFANS-1/A CPDLC CONNECT\n`;
/** label 52, tail PT-ZNG, contains "warn" */
export const MESSAGE_3 = `${HEADER_3} AES:E4920F GES:D0 2 .PT-ZNG ! 52 C\nENGINE warn LIGHT\n`;
/** no label, no tail */
export const MESSAGE_4 = `${HEADER_4} GARBLED RECORD\n`;
