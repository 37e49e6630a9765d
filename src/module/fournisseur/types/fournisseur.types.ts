export type Fournisseur = {
  nom: string;
  adresse: string | null;
  email: string | null;
  telephone: string | null;
  logo_path: string | null;
  siret: string | null;
  tva_intra: string | null;
  updated_at: string;
};
