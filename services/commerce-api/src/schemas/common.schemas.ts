export const errorResponse = (description: string, code: string, message: string) => ({
     description,
     type: 'object',
     properties: {
          error: { type: 'string', example: code },
          message: { type: 'string', example: message },
     },
});

export const internalErrorResponse = errorResponse(
     'Internal server error',
     'INTERNAL_ERROR',
     'An unexpected error occurred'
);

export const storageFailureResponse = errorResponse(
     'Storage failure, nothing was changed',
     'STORAGE_FAILURE',
     'Storage failure while trying to reserve inventory: connection terminated'
);

export const idParams = (description: string, example: string) => ({
     type: 'object',
     required: ['id'],
     properties: {
          id: { type: 'string', description, example },
     },
});
