import db from '../client.js';

export { db };
