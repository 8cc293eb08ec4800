/**
 * In-memory RoutingKit network, one array per attribute file
 */

export interface RoutingKitNetwork {
  firstOut: number[];
  head: number[];
  travelTime: number[];
  latitude: number[];
  longitude: number[];
}
