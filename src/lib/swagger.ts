// OpenAPI description served at /docs
type Operation = { summary: string; tags: string[]; security?: Array<Record<string, string[]>> };

const session = [{ sessionCookie: [] }];

const op = (summary: string, tag: string, secured = true): Operation =>
  secured ? { summary, tags: [tag], security: session } : { summary, tags: [tag] };

export function buildSwaggerSpec() {
  return {
    openapi: '3.0.3',
    info: {
      title: 'Food Ordering API',
      version: '1.0.0',
      description: 'Menu browsing, session cart, checkout and order history.',
    },
    components: {
      securitySchemes: {
        sessionCookie: { type: 'apiKey', in: 'cookie', name: 'sid' },
      },
    },
    paths: {
      '/api/auth/register': { post: op('Create an account', 'Auth', false) },
      '/api/auth/login': { post: op('Log in and start a session', 'Auth', false) },
      '/api/auth/logout': { post: op('End the session', 'Auth') },
      '/api/auth/me': { get: op('Current identity', 'Auth') },
      '/api/menu': {
        get: op('List menu items, optionally by category', 'Menu', false),
        post: op('Create a menu item (admin)', 'Menu'),
      },
      '/api/menu/categories': { get: op('Distinct categories', 'Menu', false) },
      '/api/menu/{id}': {
        get: op('Get a menu item', 'Menu', false),
        put: op('Update a menu item (admin)', 'Menu'),
        delete: op('Delete a menu item (admin)', 'Menu'),
      },
      '/api/cart': { get: op('Priced view of the cart', 'Cart') },
      '/api/cart/items/{itemId}': {
        post: op('Add one of an item', 'Cart'),
        patch: op('Increment or decrement an item', 'Cart'),
        delete: op('Remove an item', 'Cart'),
      },
      '/api/checkout': {
        get: op('Enter the delivery-details step', 'Checkout'),
        post: op('Submit delivery details', 'Checkout'),
      },
      '/api/checkout/payment': {
        get: op('Enter the payment step', 'Checkout'),
        post: op('Submit payment details and place the order', 'Checkout'),
      },
      '/api/orders': { get: op('Own orders, newest first', 'Orders') },
      '/api/admin/menu': { get: op('All menu items, newest first (admin)', 'Admin') },
      '/api/admin/summary/run': { post: op("Send today's sales summary (admin)", 'Admin') },
    },
  };
}
