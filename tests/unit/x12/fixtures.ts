/**
 * Sample ISA headers (106 bytes each)
 */

export const ISA_STANDARD =
  'ISA*00*          *00*          *ZZ*SENDERID       *ZZ*RECEIVERID     *250403*0856*U*00501*000000001*0*P*:~';

export const ISA_ALTERNATE =
  'ISA^00^          ^00^          ^ZZ^SENDERID       ^ZZ^RECEIVERID     ^250403^0856^U^00401^000000002^1^T^>}';

export const INTERCHANGE =
  ISA_STANDARD +
  '\r\nGS*HC*SENDERID*RECEIVERID*20250403*0856*1*X*005010X222A1~' +
  'ST*837*0001~' +
  'SE*2*0001~' +
  'GE*1*1~' +
  'IEA*1*000000001~';

/**
 * Replace one position of a header
 */
export function withByteAt(header: string, index: number, ch: string): string {
  return header.slice(0, index) + ch + header.slice(index + 1);
}
