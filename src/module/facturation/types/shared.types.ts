export type ClientLite = {
  id: number;
  code_client: string | null;
  nom: string;
  prenom: string | null;
};

export type Paginated<T> = { items: T[]; total: number };
