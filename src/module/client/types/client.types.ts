// src/module/client/types/client.types.ts
export type Client = {
  id: number;
  code_client: string | null;
  nom: string;
  prenom: string | null;
  email: string | null;
  telephone: string | null;
  adresse: string | null;
  code_postal: string | null;
  ville: string | null;
  pays: string;
  logo_path: string | null;
  created_at: string;
  updated_at: string;
};

export type ClientDeletePolicy = "detach" | "restrict";

export type DeleteClientResult = {
  id: number;
  /** Factures qui gardent une référence vers le client supprimé. */
  factures_detachees: number;
};
