import type { OpenAPIV3_1 } from 'openapi-types';
import { TYPES_FACTURATION } from '../module/facturation/validators/factures.validators';
import { STATUTS_FACTURE } from '../module/facturation/lib/statut';

const json = (schema: string) => ({
  'application/json': { schema: { $ref: `#/components/schemas/${schema}` } },
});

const error = (description: string): OpenAPIV3_1.ResponseObject => ({
  description,
  content: json('ErrorResponse'),
});

const idParam: OpenAPIV3_1.ParameterObject = {
  name: 'id',
  in: 'path',
  required: true,
  schema: { type: 'integer', minimum: 1 },
};

const sessionParam: OpenAPIV3_1.ParameterObject = {
  name: 'sessionId',
  in: 'path',
  required: true,
  schema: { type: 'string', format: 'uuid' },
};

const tvaParam: OpenAPIV3_1.ParameterObject = {
  name: 'tva_pourcent',
  in: 'query',
  required: false,
  schema: { type: 'number', minimum: 0, maximum: 100, default: 20 },
};

const nullableString: OpenAPIV3_1.SchemaObject = { type: ['string', 'null'] };

export const swaggerSpec: OpenAPIV3_1.Document = {
  openapi: '3.1.0',
  info: {
    title: 'API de facturation',
    version: '1.0.0',
    description: 'Fournisseur, clients, brouillons de facture, factures et rendu PDF.',
  },
  servers: [{ url: '/api/v1', description: 'API v1 (même host)' }],
  components: {
    schemas: {
      ErrorResponse: {
        type: 'object',
        required: ['error', 'message'],
        properties: {
          error: { type: 'string', example: 'VALIDATION_ERROR' },
          message: { type: 'string' },
          details: {},
        },
      },
      Fournisseur: {
        type: 'object',
        properties: {
          nom: { type: 'string' },
          adresse: nullableString,
          email: nullableString,
          telephone: nullableString,
          logo_path: nullableString,
          siret: nullableString,
          tva_intra: nullableString,
          updated_at: { type: 'string' },
        },
      },
      ReplaceFournisseur: {
        type: 'object',
        required: ['nom'],
        properties: {
          nom: { type: 'string', minLength: 1 },
          adresse: nullableString,
          email: { type: ['string', 'null'], format: 'email' },
          telephone: nullableString,
          siret: nullableString,
          tva_intra: nullableString,
        },
      },
      CreateClient: {
        type: 'object',
        required: ['nom'],
        properties: {
          code_client: { type: ['string', 'null'], description: 'Code externe, unique si renseigné' },
          nom: { type: 'string', minLength: 1 },
          prenom: nullableString,
          email: { type: ['string', 'null'], format: 'email' },
          telephone: nullableString,
          adresse: nullableString,
          code_postal: nullableString,
          ville: nullableString,
          pays: { type: ['string', 'null'], default: 'France' },
        },
        example: { nom: 'Dupont', prenom: 'Jean', ville: 'Lyon' },
      },
      Client: {
        allOf: [
          { $ref: '#/components/schemas/CreateClient' },
          {
            type: 'object',
            properties: {
              id: { type: 'integer' },
              logo_path: nullableString,
              created_at: { type: 'string' },
              updated_at: { type: 'string' },
            },
          },
        ],
      },
      Ligne: {
        type: 'object',
        required: ['description', 'type_facturation', 'quantite', 'prix_unitaire'],
        properties: {
          description: { type: 'string', minLength: 1 },
          type_facturation: { type: 'string', enum: [...TYPES_FACTURATION] },
          quantite: { type: 'number', exclusiveMinimum: 0 },
          prix_unitaire: { type: 'number', minimum: 0 },
        },
        example: { description: 'Carrelage', type_facturation: 'm²', quantite: 10, prix_unitaire: 25 },
      },
      CreateFacture: {
        type: 'object',
        required: ['client_id', 'lignes'],
        properties: {
          client_id: { type: 'integer' },
          tva_pourcent: { type: 'number', minimum: 0, maximum: 100, default: 20 },
          notes: nullableString,
          lignes: { type: 'array', minItems: 1, items: { $ref: '#/components/schemas/Ligne' } },
        },
      },
      CommitResult: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          numero: { type: 'string', example: 'F2026-0001' },
        },
      },
      Totaux: {
        type: 'object',
        properties: {
          total_ht: { type: 'number' },
          montant_tva: { type: 'number' },
          total_ttc: { type: 'number' },
        },
      },
      Statut: { type: 'string', enum: [...STATUTS_FACTURE] },
    },
  },
  paths: {
    '/fournisseur': {
      get: {
        tags: ['Fournisseur'],
        summary: 'Profil fournisseur',
        responses: { '200': { description: 'OK', content: json('Fournisseur') } },
      },
      put: {
        tags: ['Fournisseur'],
        summary: 'Remplacer le profil fournisseur',
        requestBody: { required: true, content: json('ReplaceFournisseur') },
        responses: {
          '200': { description: 'OK', content: json('Fournisseur') },
          '400': error('Requête invalide'),
        },
      },
    },
    '/fournisseur/logo': {
      post: {
        tags: ['Fournisseur'],
        summary: 'Téléverser le logo fournisseur (multipart, champ "logo", PNG/JPEG/GIF/WebP)',
        responses: { '201': { description: 'Créé' }, '400': error('Fichier manquant ou invalide') },
      },
    },
    '/clients': {
      get: {
        tags: ['Clients'],
        summary: 'Lister les clients (plus récents en premier)',
        responses: {
          '200': {
            description: 'OK',
            content: { 'application/json': { schema: { type: 'array', items: { $ref: '#/components/schemas/Client' } } } },
          },
        },
      },
      post: {
        tags: ['Clients'],
        summary: 'Créer un client',
        requestBody: { required: true, content: json('CreateClient') },
        responses: {
          '201': { description: 'Créé' },
          '400': error('Requête invalide'),
          '409': error('Code client déjà utilisé'),
        },
      },
    },
    '/clients/{id}': {
      get: {
        tags: ['Clients'],
        summary: 'Obtenir un client',
        parameters: [idParam],
        responses: { '200': { description: 'OK', content: json('Client') }, '404': error('Introuvable') },
      },
      delete: {
        tags: ['Clients'],
        summary: 'Supprimer un client (selon CLIENT_DELETE_POLICY)',
        parameters: [idParam],
        responses: {
          '200': { description: 'Supprimé' },
          '404': error('Introuvable'),
          '409': error('Client référencé par des factures (politique restrict)'),
        },
      },
    },
    '/clients/{id}/logo': {
      post: {
        tags: ['Clients'],
        summary: 'Téléverser le logo client (multipart, champ "logo", PNG/JPEG/GIF/WebP)',
        parameters: [idParam],
        responses: { '201': { description: 'Créé' }, '404': error('Introuvable') },
      },
    },
    '/brouillons': {
      post: {
        tags: ['Brouillons'],
        summary: 'Ouvrir un brouillon de facture',
        responses: { '201': { description: 'Créé' } },
      },
    },
    '/brouillons/{sessionId}': {
      get: {
        tags: ['Brouillons'],
        summary: 'Lignes et totaux du brouillon',
        parameters: [sessionParam, tvaParam],
        responses: { '200': { description: 'OK' }, '404': error('Introuvable') },
      },
      delete: {
        tags: ['Brouillons'],
        summary: 'Abandonner le brouillon',
        parameters: [sessionParam],
        responses: { '204': { description: 'Abandonné' }, '404': error('Introuvable') },
      },
    },
    '/brouillons/{sessionId}/lignes': {
      post: {
        tags: ['Brouillons'],
        summary: 'Ajouter une ligne',
        parameters: [sessionParam],
        requestBody: { required: true, content: json('Ligne') },
        responses: { '201': { description: 'Ajoutée' }, '400': error('Ligne invalide, brouillon inchangé') },
      },
      delete: {
        tags: ['Brouillons'],
        summary: 'Effacer les lignes',
        parameters: [sessionParam],
        responses: { '200': { description: 'OK' } },
      },
    },
    '/brouillons/{sessionId}/totaux': {
      get: {
        tags: ['Brouillons'],
        summary: 'Totaux HT / TVA / TTC',
        parameters: [sessionParam, tvaParam],
        responses: { '200': { description: 'OK', content: json('Totaux') } },
      },
    },
    '/brouillons/{sessionId}/commit': {
      post: {
        tags: ['Brouillons'],
        summary: 'Enregistrer le brouillon en facture (la session est fermée après succès)',
        parameters: [sessionParam],
        responses: {
          '201': { description: 'Facture créée', content: json('CommitResult') },
          '400': error('Brouillon vide ou requête invalide'),
          '404': error('Brouillon ou client introuvable'),
          '409': error('Conflit de numérotation'),
        },
      },
    },
    '/factures': {
      get: {
        tags: ['Factures'],
        summary: 'Lister les factures avec le nom du client',
        parameters: [
          { name: 'q', in: 'query', schema: { type: 'string' } },
          { name: 'client_id', in: 'query', schema: { type: 'integer' } },
          { name: 'statut', in: 'query', schema: { $ref: '#/components/schemas/Statut' } },
          { name: 'from', in: 'query', schema: { type: 'string', format: 'date' } },
          { name: 'to', in: 'query', schema: { type: 'string', format: 'date' } },
          { name: 'page', in: 'query', schema: { type: 'integer', default: 1 } },
          { name: 'pageSize', in: 'query', schema: { type: 'integer', default: 50 } },
        ],
        responses: { '200': { description: 'OK' } },
      },
      post: {
        tags: ['Factures'],
        summary: 'Créer une facture (numérotation + totaux calculés côté serveur)',
        requestBody: { required: true, content: json('CreateFacture') },
        responses: {
          '201': { description: 'Créée', content: json('CommitResult') },
          '400': error('Requête invalide'),
          '404': error('Client introuvable'),
          '409': error('Conflit de numérotation'),
        },
      },
    },
    '/factures/summary': {
      get: {
        tags: ['Factures'],
        summary: "Nombre de factures, chiffre d'affaires HT/TTC, factures en attente",
        responses: { '200': { description: 'OK' } },
      },
    },
    '/factures/numero/{numero}': {
      get: {
        tags: ['Factures'],
        summary: 'Rechercher une facture par numéro',
        parameters: [{ name: 'numero', in: 'path', required: true, schema: { type: 'string' } }],
        responses: { '200': { description: 'OK' }, '404': error('Introuvable') },
      },
    },
    '/factures/{id}': {
      get: {
        tags: ['Factures'],
        summary: 'Facture et lignes ordonnées',
        parameters: [idParam],
        responses: { '200': { description: 'OK' }, '404': error('Introuvable') },
      },
    },
    '/factures/{id}/statut': {
      patch: {
        tags: ['Factures'],
        summary: 'Changer le statut (idempotent)',
        parameters: [idParam],
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: {
                type: 'object',
                required: ['statut'],
                properties: { statut: { $ref: '#/components/schemas/Statut' } },
              },
            },
          },
        },
        responses: { '200': { description: 'OK' }, '404': error('Introuvable') },
      },
    },
    '/factures/{id}/rendu': {
      get: {
        tags: ['Factures'],
        summary: 'Instantané {fournisseur, client, facture, lignes} pour les moteurs de rendu',
        parameters: [idParam],
        responses: { '200': { description: 'OK' }, '404': error('Introuvable') },
      },
    },
    '/factures/{id}/pdf': {
      get: {
        tags: ['Factures'],
        summary: 'Facture au format PDF',
        parameters: [idParam, { name: 'download', in: 'query', schema: { type: 'boolean' } }],
        responses: {
          '200': { description: 'PDF', content: { 'application/pdf': {} } },
          '404': error('Introuvable'),
        },
      },
    },
  },
};
