import { JsonObject } from '@src/core/types/index.js';

/**
 * A small but complete document touching every record kind: fixed fields, path templates,
 * references at each level, and extensions in several positions.
 */
export const petStoreDocument: JsonObject = {
    openapi: '3.1.0',
    info: { title: 'Pet Store', version: '1.0.0' },
    servers: [{ url: 'https://api.example.test/v1', 'x-region': 'eu' }],
    paths: {
        '/pets': {
            summary: 'Pet collection',
            post: {
                operationId: 'createPet',
                requestBody: { $ref: '#/components/requestBodies/NewPet' },
                responses: { '201': { description: 'Created' } },
            },
            get: {
                operationId: 'listPets',
                tags: ['pets'],
                parameters: [
                    { $ref: '#/components/parameters/limit' },
                    { name: 'cursor', in: 'query', schema: { type: 'string' }, 'x-example-cursor': 'abc' },
                ],
                responses: { '200': { description: 'A page of pets' } },
            },
            'x-rate-limit': { requests: 100, per: 'minute' },
        },
        '/pets/{petId}': { $ref: '#/components/pathItems/pet' },
        'x-paths-owner': 'pets-team',
    },
    webhooks: {
        petAdopted: {
            post: { operationId: 'onPetAdopted' },
        },
    },
    components: {
        parameters: { limit: { name: 'limit', in: 'query', schema: { type: 'integer' } } },
    },
    'x-generated-by': 'hand',
};
