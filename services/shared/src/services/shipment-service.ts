import { PoolClient } from 'pg';
import type { JsonObject, Shipment } from '../types/commerce.types';
import { DuplicateRecordError, isUniqueViolation, ShipmentNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

interface ShipmentRow {
     id: string;
     order_id: string;
     address: JsonObject;
     items: unknown[];
     status: string;
}

function toShipment(row: ShipmentRow): Shipment {
     return {
          id: row.id,
          orderId: row.order_id,
          address: row.address,
          items: row.items,
          status: row.status,
     };
}

export class ShipmentService {
     async createShipment(client: PoolClient, shipment: Shipment): Promise<Shipment> {
          try {
               await client.query(
                    `
        INSERT INTO shipments (id, order_id, address, items, status)
        VALUES ($1, $2, $3::jsonb, $4::jsonb, $5)
      `,
                    [
                         shipment.id,
                         shipment.orderId,
                         JSON.stringify(shipment.address),
                         JSON.stringify(shipment.items),
                         shipment.status,
                    ]
               );
          } catch (error) {
               if (isUniqueViolation(error)) {
                    throw new DuplicateRecordError('Shipment', shipment.id);
               }
               throw error;
          }

          logger.info({ shipmentId: shipment.id, orderId: shipment.orderId }, 'Shipment created');
          return shipment;
     }

     async getShipment(client: PoolClient, id: string): Promise<Shipment> {
          const { rows } = await client.query<ShipmentRow>(
               `SELECT id, order_id, address, items, status FROM shipments WHERE id = $1`,
               [id]
          );
          if (rows.length === 0) {
               throw new ShipmentNotFoundError(id);
          }
          return toShipment(rows[0]);
     }

     async listShipments(client: PoolClient): Promise<Shipment[]> {
          const { rows } = await client.query<ShipmentRow>(
               `SELECT id, order_id, address, items, status FROM shipments`
          );
          return rows.map(toShipment);
     }

     async replaceShipment(client: PoolClient, shipment: Shipment): Promise<Shipment> {
          const { rowCount } = await client.query(
               `
      UPDATE shipments
      SET order_id = $2,
          address = $3::jsonb,
          items = $4::jsonb,
          status = $5,
          updated_at = NOW()
      WHERE id = $1
    `,
               [
                    shipment.id,
                    shipment.orderId,
                    JSON.stringify(shipment.address),
                    JSON.stringify(shipment.items),
                    shipment.status,
               ]
          );
          if ((rowCount ?? 0) === 0) {
               throw new ShipmentNotFoundError(shipment.id);
          }
          return shipment;
     }

     async deleteShipment(client: PoolClient, id: string): Promise<void> {
          await client.query(`DELETE FROM shipments WHERE id = $1`, [id]);
     }
}
