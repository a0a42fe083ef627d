import { Router } from 'express';
import { ItemController } from '../../controllers/item.controller';
import { ItemService } from '../../services/item.service';
import { validate } from '../../middleware/validation.middleware';
import {
  createItemSchema,
  itemIdSchema,
  listItemsSchema,
  popularItemsSchema,
} from '../../validators/item.validator';

/**
 * Item routes (v1)
 */
export const createItemsRouter = (itemService: ItemService): Router => {
  const router = Router();
  const itemController = new ItemController(itemService);

  /**
   * @swagger
   * /v1/items:
   *   post:
   *     summary: Add an item to the catalog
   *     tags: [Items]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - item_type
   *               - item_id
   *               - title
   *             properties:
   *               item_type:
   *                 type: string
   *                 enum: [Book, Magazine, DVD]
   *               item_id:
   *                 type: string
   *               title:
   *                 type: string
   *               author:
   *                 type: string
   *                 description: Book only (required)
   *               isbn:
   *                 type: string
   *                 description: Book only (required)
   *               pages:
   *                 type: integer
   *                 minimum: 0
   *                 description: Book only
   *               issue_number:
   *                 type: string
   *                 description: Magazine only (required)
   *               publisher:
   *                 type: string
   *                 description: Magazine only (required)
   *               publication_date:
   *                 type: string
   *                 format: date-time
   *                 description: Magazine only
   *               duration:
   *                 type: integer
   *                 minimum: 1
   *                 description: DVD only, in minutes (required)
   *               genre:
   *                 type: string
   *                 description: DVD only (required)
   *               director:
   *                 type: string
   *                 description: DVD only
   *               rating:
   *                 type: string
   *                 enum: [G, PG, PG-13, R, NC-17, NR]
   *                 description: DVD only
   *     responses:
   *       201:
   *         description: Item added
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Item'
   *       400:
   *         description: Validation failed
   *       409:
   *         description: An item with this ID already exists
   *   get:
   *     summary: List catalog items
   *     tags: [Items]
   *     parameters:
   *       - in: query
   *         name: type
   *         schema:
   *           type: string
   *           enum: [Book, Magazine, DVD]
   *       - in: query
   *         name: available
   *         schema:
   *           type: boolean
   *       - in: query
   *         name: q
   *         description: Case-insensitive title search
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Items ordered by title
   */
  router.post('/', validate(createItemSchema), itemController.addItem);
  router.get('/', validate(listItemsSchema), itemController.listItems);

  /**
   * @swagger
   * /v1/items/popular:
   *   get:
   *     summary: Most borrowed items
   *     tags: [Items]
   *     parameters:
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           minimum: 1
   *           default: 10
   *     responses:
   *       200:
   *         description: Items with their loan counts, most borrowed first
   */
  router.get('/popular', validate(popularItemsSchema), itemController.getPopularItems);

  /**
   * @swagger
   * /v1/items/{id}:
   *   get:
   *     summary: Get an item
   *     tags: [Items]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Item retrieved successfully
   *       404:
   *         description: Item not found
   *   delete:
   *     summary: Remove an item from the catalog
   *     tags: [Items]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Item removed
   *       404:
   *         description: Item not found
   *       409:
   *         description: Item is on loan
   */
  router.get('/:id', validate(itemIdSchema), itemController.getItem);
  router.delete('/:id', validate(itemIdSchema), itemController.removeItem);

  return router;
};
