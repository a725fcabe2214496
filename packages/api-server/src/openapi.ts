/**
 * OpenAPI 3.0 specification for the PaperGraph question-answering API.
 */
export interface OpenAPISpec {
  readonly openapi: string;
  readonly info: {
    readonly title: string;
    readonly version: string;
    readonly description: string;
  };
  readonly paths: Record<string, unknown>;
  readonly components: Record<string, unknown>;
}

const QUESTION_PROPERTY = {
  type: 'string',
  minLength: 1,
  maxLength: 2000,
  description: 'Natural language question about the paper',
} as const;

export function createOpenAPISpec(): OpenAPISpec {
  return {
    openapi: '3.0.3',
    info: {
      title: 'PaperGraph API',
      version: '0.1.0',
      description:
        'Answers natural language questions about a research paper stored as a Neo4j knowledge graph. ' +
        'Questions are classified by intent, turned into Cypher queries and the returned rows are ranked.',
    },
    paths: {
      '/api/v1/ask': {
        post: {
          summary: 'Answer a question',
          description:
            'Classify the question, run its Cypher queries concurrently and return the ranked rows, best first.',
          operationId: 'askQuestion',
          tags: ['Questions'],
          security: [{ apiKeyAuth: [] }, { bearerAuth: [] }],
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  required: ['question'],
                  properties: {
                    question: QUESTION_PROPERTY,
                    top_n: {
                      type: 'integer',
                      minimum: 1,
                      maximum: 100,
                      description: 'Maximum number of rows to return (server default when omitted)',
                    },
                  },
                },
              },
            },
          },
          responses: {
            '200': {
              description: 'Ranked answer rows',
              content: {
                'application/json': {
                  schema: { $ref: '#/components/schemas/AskResponse' },
                },
              },
            },
            '400': { $ref: '#/components/responses/ValidationError' },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '500': { $ref: '#/components/responses/QueryFailed' },
            '503': { $ref: '#/components/responses/ServiceUnavailable' },
          },
        },
      },
      '/api/v1/classify': {
        post: {
          summary: 'Classify a question',
          description: 'Return the intent, entities and Cypher queries for a question without running them.',
          operationId: 'classifyQuestion',
          tags: ['Questions'],
          security: [{ apiKeyAuth: [] }, { bearerAuth: [] }],
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  required: ['question'],
                  properties: { question: QUESTION_PROPERTY },
                },
              },
            },
          },
          responses: {
            '200': {
              description: 'Classification and query plan',
              content: {
                'application/json': {
                  schema: { $ref: '#/components/schemas/ClassifyResponse' },
                },
              },
            },
            '400': { $ref: '#/components/responses/ValidationError' },
            '401': { $ref: '#/components/responses/Unauthorized' },
          },
        },
      },
      '/api/v1/status': {
        get: {
          summary: 'Get graph status',
          description: 'Graph connectivity and node/relationship counts.',
          operationId: 'getStatus',
          tags: ['Status'],
          security: [{ apiKeyAuth: [] }, { bearerAuth: [] }],
          responses: {
            '200': {
              description: 'Graph status',
              content: {
                'application/json': {
                  schema: { $ref: '#/components/schemas/StatusResponse' },
                },
              },
            },
            '401': { $ref: '#/components/responses/Unauthorized' },
          },
        },
      },
      '/health': {
        get: {
          summary: 'Health check',
          description: 'Simple health check endpoint. No authentication required.',
          operationId: 'healthCheck',
          tags: ['Health'],
          responses: {
            '200': {
              description: 'Server is healthy',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      status: { type: 'string', enum: ['ok'] },
                      timestamp: { type: 'string', format: 'date-time' },
                    },
                  },
                },
              },
            },
          },
        },
      },
    },
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          description: 'API key passed as Bearer token in the Authorization header',
        },
        apiKeyAuth: {
          type: 'apiKey',
          in: 'header',
          name: 'X-API-Key',
          description: 'API key passed in the X-API-Key header',
        },
      },
      schemas: {
        Entities: {
          type: 'object',
          properties: {
            diseases: { type: 'array', items: { type: 'string' } },
            algorithms: { type: 'array', items: { type: 'string', enum: ['svm', 'ann', 'rf', 'mlr'] } },
            sections: {
              type: 'array',
              items: { type: 'string', enum: ['abstract', 'introduction', 'methodology', 'results', 'conclusion'] },
            },
          },
        },
        AnswerRow: {
          type: 'object',
          properties: {
            tag: { type: 'string', description: 'Query tag the row came from' },
            score: { type: 'number' },
            fields: { type: 'object', additionalProperties: true },
          },
        },
        AskResponse: {
          type: 'object',
          properties: {
            question: { type: 'string' },
            intent: { type: 'string' },
            entities: { $ref: '#/components/schemas/Entities' },
            results: { type: 'array', items: { $ref: '#/components/schemas/AnswerRow' } },
            total: { type: 'integer', description: 'Rows returned by the graph before truncation' },
          },
        },
        ClassifyResponse: {
          type: 'object',
          properties: {
            question: { type: 'string' },
            intent: { type: 'string' },
            entities: { $ref: '#/components/schemas/Entities' },
            queries: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  tag: { type: 'string' },
                  query: { type: 'string' },
                  params: { type: 'object', additionalProperties: { type: 'string' } },
                },
              },
            },
          },
        },
        StatusResponse: {
          type: 'object',
          properties: {
            health: { type: 'string', enum: ['ok', 'degraded', 'not_initialized'] },
            graph_uri: { type: 'string', nullable: true },
            top_n: { type: 'integer', nullable: true },
            total_nodes: { type: 'integer' },
            total_relationships: { type: 'integer' },
            node_types: {
              type: 'array',
              items: {
                type: 'object',
                properties: { label: { type: 'string' }, count: { type: 'integer' } },
              },
            },
            message: { type: 'string' },
          },
        },
        ErrorResponse: {
          type: 'object',
          properties: {
            error: { type: 'string' },
            message: { type: 'string' },
          },
        },
      },
      responses: {
        ValidationError: {
          description: 'Request validation error',
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: {
                  error: { type: 'string' },
                  details: { type: 'array', items: { type: 'object' } },
                },
              },
            },
          },
        },
        Unauthorized: {
          description: 'Missing or invalid API key',
          content: {
            'application/json': {
              schema: { $ref: '#/components/schemas/ErrorResponse' },
            },
          },
        },
        QueryFailed: {
          description: 'A graph query failed',
          content: {
            'application/json': {
              schema: { $ref: '#/components/schemas/ErrorResponse' },
            },
          },
        },
        ServiceUnavailable: {
          description: 'Graph connection not initialized',
          content: {
            'application/json': {
              schema: { $ref: '#/components/schemas/ErrorResponse' },
            },
          },
        },
      },
    },
  };
}
