import { Request, Response } from 'express';
import { NewItemInput } from '../models/item.model';
import { ItemService } from '../services/item.service';
import { parseRequest } from '../middleware/validation.middleware';
import {
  CreateItemRequest,
  createItemSchema,
  itemIdSchema,
  listItemsSchema,
  popularItemsSchema,
} from '../validators/item.validator';
import { createMutationResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { serializeItem, serializePopularItem } from '../utils/serializers';

const toItemInput = (body: CreateItemRequest['body']): NewItemInput => {
  switch (body.item_type) {
    case 'Book':
      return {
        kind: 'Book',
        id: body.item_id,
        title: body.title,
        author: body.author,
        isbn: body.isbn,
        ...(body.pages !== undefined && { pages: body.pages }),
      };
    case 'Magazine':
      return {
        kind: 'Magazine',
        id: body.item_id,
        title: body.title,
        issueNumber: body.issue_number,
        publisher: body.publisher,
        ...(body.publication_date !== undefined && { publicationDate: new Date(body.publication_date) }),
      };
    case 'DVD':
      return {
        kind: 'DVD',
        id: body.item_id,
        title: body.title,
        durationMinutes: body.duration,
        genre: body.genre,
        director: body.director,
        rating: body.rating,
      };
  }
};

/**
 * Item Controller
 *
 * HTTP request handlers for catalog endpoints
 */
export class ItemController {
  constructor(private itemService: ItemService) {}

  /**
   * POST /v1/items
   * Add a book, magazine or DVD to the catalog
   */
  addItem = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createItemSchema, req);

    const { value: item, persisted } = await this.itemService.addItem(toItemInput(body));

    res.status(201).json(createMutationResponse(serializeItem(item), persisted, `${item.kind} added to catalog`));
  });

  /**
   * GET /v1/items
   * List items, optionally filtered by type, availability and title
   */
  listItems = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(listItemsSchema, req);

    const items = await this.itemService.listItems({
      ...(query.type !== undefined && { kind: query.type }),
      ...(query.available !== undefined && { available: query.available }),
      ...(query.q !== undefined && { query: query.q }),
    });

    res.status(200).json(createSuccessResponse(items.map(serializeItem)));
  });

  /**
   * GET /v1/items/popular
   * Most borrowed items
   */
  getPopularItems = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(popularItemsSchema, req);

    const popular = await this.itemService.getPopularItems(query.limit);

    res.status(200).json(createSuccessResponse(popular.map(serializePopularItem)));
  });

  /**
   * GET /v1/items/:id
   */
  getItem = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(itemIdSchema, req);

    const item = await this.itemService.getItem(params.id);

    res.status(200).json(createSuccessResponse(serializeItem(item)));
  });

  /**
   * DELETE /v1/items/:id
   * Withdraw an item that is not on loan
   */
  removeItem = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(itemIdSchema, req);

    const { value: item, persisted } = await this.itemService.removeItem(params.id);

    res.status(200).json(createMutationResponse(serializeItem(item), persisted, `Item ${item.id} removed`));
  });
}
