export type AddressQuery = {
  postcode: string;
  houseNumber: string | number;
  houseLetter?: string | null;
  addition?: string | null;
};

export type PostcodeZoneEntry = {
  postcode: string; // "1012JS" or a 4-digit prefix "1012"
  houseNumberFrom: number | null;
  houseNumberTo: number | null;
  zoneId: string;
  street: string | null;
  city: string | null;
};

export type ResolvedZone = {
  zoneId: string;
  postcode: string;
  houseNumber: number;
  address: string;
  method: "postcode" | "prefix";
};

export interface ZoneResolver {
  resolveZone(query: AddressQuery): ResolvedZone;
}
