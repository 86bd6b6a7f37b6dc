import swaggerJsdoc from 'swagger-jsdoc';

export function buildSwaggerSpec(): object {
  const options: swaggerJsdoc.Options = {
    definition: {
      openapi: '3.0.0',
      info: {
        title: 'Learning Lab API',
        version: '1.0.0',
        description:
          'Static catalog, user and post resources, and session-based age and role gates',
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development server' }],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
        },
        schemas: {
          ErrorResponse: {
            type: 'object',
            required: ['code', 'message'],
            properties: {
              code: {
                type: 'string',
                description: 'Error code identifier',
                example: 'UNDERAGE',
              },
              message: {
                type: 'string',
                description: 'Human-readable error message',
                example: 'Too Young, come after 3 years',
              },
              details: {
                type: 'object',
                description: 'Additional error details (optional)',
                additionalProperties: true,
              },
            },
          },
        },
      },
      tags: [
        { name: 'Web', description: 'Plain routes at the root' },
        { name: 'Auth', description: 'Signup and login' },
        { name: 'Access', description: 'Age- and role-gated routes' },
        { name: 'Users', description: 'User resource' },
        { name: 'Posts', description: 'Post resource' },
        { name: 'Catalog', description: 'In-memory users, posts and comments' },
      ],
    },
    apis: ['./src/infra/http/routes/*.ts'],
  };

  return swaggerJsdoc(options);
}
