import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as ynab from 'ynab';
import { z } from 'zod';
import { withToolErrorHandling } from '../types/index.js';
import { jsonResult } from '../server/responseFormatter.js';
import { budgetIdSchema, lastKnowledgeSchema } from './common.js';
import { project, projectPayee, projectPayeeLocation, type PayeeRecord } from './projections.js';

/**
 * Schema for get_payees tool parameters
 */
export const GetPayeesSchema = z
  .object({
    budget_id: budgetIdSchema,
    last_knowledge_of_server: lastKnowledgeSchema,
  })
  .strict();

export type GetPayeesParams = z.infer<typeof GetPayeesSchema>;

/**
 * Schema for get_payee_by_id and get_payee_locations_by_payee tool parameters
 */
export const GetPayeeSchema = z
  .object({
    payee_id: z.string().min(1, 'Payee ID is required'),
    budget_id: budgetIdSchema,
  })
  .strict();

export type GetPayeeParams = z.infer<typeof GetPayeeSchema>;

export const UpdatePayeeSchema = z
  .object({
    payee_id: z.string().min(1, 'Payee ID is required'),
    name: z.string().min(1, 'Payee name is required'),
    budget_id: budgetIdSchema,
  })
  .strict();

export type UpdatePayeeParams = z.infer<typeof UpdatePayeeSchema>;

export const GetPayeeLocationsSchema = z
  .object({
    budget_id: budgetIdSchema,
  })
  .strict();

export type GetPayeeLocationsParams = z.infer<typeof GetPayeeLocationsSchema>;

export const GetPayeeLocationSchema = z
  .object({
    payee_location_id: z.string().min(1, 'Payee location ID is required'),
    budget_id: budgetIdSchema,
  })
  .strict();

export type GetPayeeLocationParams = z.infer<typeof GetPayeeLocationSchema>;

export const SearchPayeesSchema = z
  .object({
    search_term: z.string().describe('Text to look for in payee names, case-insensitive'),
    budget_id: budgetIdSchema,
  })
  .strict();

export type SearchPayeesParams = z.infer<typeof SearchPayeesSchema>;

/**
 * Payees whose name contains the search term, ignoring case. An empty term
 * matches every payee.
 */
export function filterPayeesByName(payees: ynab.Payee[], searchTerm: string): PayeeRecord[] {
  const needle = searchTerm.toLowerCase();
  return payees
    .filter((payee) => payee.name.toLowerCase().includes(needle))
    .map(projectPayee);
}

/**
 * Handles the get_payees tool call
 */
export async function handleGetPayees(
  ynabAPI: ynab.API,
  params: GetPayeesParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.payees.getPayees(
        params.budget_id,
        params.last_knowledge_of_server,
      );

      return jsonResult({
        payees: response.data.payees.map(projectPayee),
        server_knowledge: response.data.server_knowledge,
      });
    },
    'get_payees',
    `listing payees for budget ${params.budget_id}`,
  );
}

/**
 * Handles the get_payee_by_id tool call
 */
export async function handleGetPayeeById(
  ynabAPI: ynab.API,
  params: GetPayeeParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.payees.getPayeeById(params.budget_id, params.payee_id);
      return jsonResult(project({ kind: 'payee', value: response.data.payee }));
    },
    'get_payee_by_id',
    `getting payee ${params.payee_id}`,
  );
}

/**
 * Handles the update_payee tool call
 */
export async function handleUpdatePayee(
  ynabAPI: ynab.API,
  params: UpdatePayeeParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.payees.updatePayee(params.budget_id, params.payee_id, {
        payee: { name: params.name },
      });

      return jsonResult({
        ...projectPayee(response.data.payee),
        message: 'Payee updated successfully',
      });
    },
    'update_payee',
    `updating payee ${params.payee_id}`,
  );
}

/**
 * Handles the get_payee_locations tool call
 */
export async function handleGetPayeeLocations(
  ynabAPI: ynab.API,
  params: GetPayeeLocationsParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.payeeLocations.getPayeeLocations(params.budget_id);
      return jsonResult({
        payee_locations: response.data.payee_locations.map(projectPayeeLocation),
      });
    },
    'get_payee_locations',
    `listing payee locations for budget ${params.budget_id}`,
  );
}

/**
 * Handles the get_payee_location_by_id tool call
 */
export async function handleGetPayeeLocationById(
  ynabAPI: ynab.API,
  params: GetPayeeLocationParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.payeeLocations.getPayeeLocationById(
        params.budget_id,
        params.payee_location_id,
      );
      return jsonResult(project({ kind: 'payee_location', value: response.data.payee_location }));
    },
    'get_payee_location_by_id',
    `getting payee location ${params.payee_location_id}`,
  );
}

/**
 * Handles the get_payee_locations_by_payee tool call
 */
export async function handleGetPayeeLocationsByPayee(
  ynabAPI: ynab.API,
  params: GetPayeeParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.payeeLocations.getPayeeLocationsByPayee(
        params.budget_id,
        params.payee_id,
      );
      return jsonResult({
        payee_id: params.payee_id,
        locations: response.data.payee_locations.map(projectPayeeLocation),
      });
    },
    'get_payee_locations_by_payee',
    `listing locations for payee ${params.payee_id}`,
  );
}

/**
 * Handles the search_payees tool call
 */
export async function handleSearchPayees(
  ynabAPI: ynab.API,
  params: SearchPayeesParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const response = await ynabAPI.payees.getPayees(params.budget_id);
      const matches = filterPayeesByName(response.data.payees, params.search_term);

      return jsonResult({
        search_term: params.search_term,
        matches,
        count: matches.length,
      });
    },
    'search_payees',
    `searching payees for "${params.search_term}"`,
  );
}
