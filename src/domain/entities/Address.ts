/**
 * Address Value Object
 * Layer: Domain
 *
 * Every address block in a registry record has the same six parts. A layout
 * may give a block fewer columns (officer addresses carry no line2 or
 * country); parts without columns decode as empty strings.
 */
export const ADDRESS_PARTS = ['line1', 'line2', 'city', 'state', 'postalCode', 'country'] as const;

export type AddressPart = (typeof ADDRESS_PARTS)[number];

export type Address = Readonly<Record<AddressPart, string>>;

export function emptyAddress(): Address {
  return { line1: '', line2: '', city: '', state: '', postalCode: '', country: '' };
}
