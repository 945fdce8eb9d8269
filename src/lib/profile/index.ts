export { buildDossier } from './dossier';
export type { DossierRequest } from './dossier';
export { comparePeers, compareEntityToPeers } from './peer_comparison';
