export * from "./ReverseGeocoder";
export * from "./ReverseGeocoderNominatim";
