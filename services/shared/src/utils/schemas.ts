// JSON-schema fragments shared by the HTTP services

export function errorResponse(description: string, code: string, message: string) {
     return {
          description,
          type: 'object',
          properties: {
               error: { type: 'string', example: code },
               message: { type: 'string', example: message },
          },
     };
}

export const internalErrorResponse = errorResponse(
     'Internal server error',
     'INTERNAL_ERROR',
     'An unexpected error occurred'
);

export const idParams = {
     type: 'object',
     required: ['id'],
     properties: {
          id: { type: 'integer', minimum: 1, example: 1 },
     },
};

export const nullableId = { type: ['integer', 'null'], minimum: 1, example: 1 };

export const healthSchema = {
     tags: ['health'],
     description: 'Basic health check',
     response: {
          200: {
               type: 'object',
               properties: {
                    status: { type: 'string', example: 'ok' },
                    timestamp: { type: 'string', format: 'date-time' },
               },
          },
     },
};

export const readinessSchema = {
     tags: ['health'],
     description: 'Readiness check with dependency validation',
     response: {
          200: {
               type: 'object',
               properties: {
                    status: { type: 'string', example: 'ready' },
                    dependencies: {
                         type: 'object',
                         properties: {
                              database: { type: 'string' },
                         },
                    },
               },
          },
          503: {
               type: 'object',
               properties: {
                    status: { type: 'string' },
                    error: { type: 'string' },
               },
          },
     },
};
