import { Pool, PoolClient } from "pg";
import { BrandInsights, BrandInsightsSchema, InsightsQuery } from "../types";

/** Storage seen by the orchestrator. Keyed by storefront base URL. */
export interface InsightsRepository {
  isEnabled(): boolean;
  healthcheck(): Promise<boolean>;
  replaceBrandInsights(baseUrl: string, insights: BrandInsights): Promise<void>;
  getBrandInsights(baseUrl: string, query: InsightsQuery): Promise<BrandInsights | null>;
  close(): Promise<void>;
}

const CHILD_TABLES = [
  "products",
  "hero_products",
  "policies",
  "faqs",
  "social_handles",
  "contact_details",
  "important_links"
] as const;

function likePattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, (match) => `\\${match}`)}%`;
}

export class Database implements InsightsRepository {
  private readonly pool: Pool | null;

  constructor(databaseUrl: string | undefined) {
    this.pool = databaseUrl ? new Pool({ connectionString: databaseUrl }) : null;
  }

  isEnabled(): boolean {
    return this.pool !== null;
  }

  async healthcheck(): Promise<boolean> {
    if (!this.pool) {
      return true;
    }
    try {
      await this.pool.query("select 1");
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Swaps a brand's stored entities for a fresh run's, in one transaction: the
   * brand row is upserted, every child row is deleted and re-inserted.
   */
  async replaceBrandInsights(baseUrl: string, insights: BrandInsights): Promise<void> {
    if (!this.pool) {
      return;
    }

    const client = await this.pool.connect();
    try {
      await client.query("begin");
      const { rows } = await client.query<{ id: number }>(
        `
        insert into brands (url, brand_text, updated_at)
        values ($1, $2, now())
        on conflict (url) do update set
          brand_text = excluded.brand_text,
          updated_at = now()
        returning id
        `,
        [baseUrl, insights.brand_text]
      );
      const brandId = rows[0]?.id;
      if (brandId === undefined) {
        throw new Error(`brand upsert returned no id for ${baseUrl}`);
      }

      for (const table of CHILD_TABLES) {
        await client.query(`delete from ${table} where brand_id = $1`, [brandId]);
      }
      await this.insertChildren(client, brandId, insights);
      await client.query("commit");
    } catch (error) {
      await client.query("rollback");
      throw error;
    } finally {
      client.release();
    }
  }

  private async insertChildren(client: PoolClient, brandId: number, insights: BrandInsights): Promise<void> {
    for (const [position, product] of insights.product_catalog.entries()) {
      await client.query(
        `
        insert into products (brand_id, position, shopify_id, title, url, image, price, description)
        values ($1, $2, $3, $4, $5, $6, $7, $8)
        `,
        [brandId, position, product.id, product.title, product.url, product.image, product.price, product.description]
      );
    }
    for (const [position, product] of insights.hero_products.entries()) {
      await client.query(
        `
        insert into hero_products (brand_id, position, title, url, image, price, description)
        values ($1, $2, $3, $4, $5, $6, $7)
        `,
        [brandId, position, product.title, product.url, product.image, product.price, product.description]
      );
    }
    for (const [position, policy] of insights.policies.entries()) {
      await client.query(
        "insert into policies (brand_id, position, type, url, content) values ($1, $2, $3, $4, $5)",
        [brandId, position, policy.type, policy.url, policy.content]
      );
    }
    for (const [position, faq] of insights.faqs.entries()) {
      await client.query("insert into faqs (brand_id, position, question, answer) values ($1, $2, $3, $4)", [
        brandId,
        position,
        faq.question,
        faq.answer
      ]);
    }
    for (const [position, handle] of insights.social_handles.entries()) {
      await client.query("insert into social_handles (brand_id, position, platform, url) values ($1, $2, $3, $4)", [
        brandId,
        position,
        handle.platform,
        handle.url
      ]);
    }
    for (const [position, contact] of insights.contact_details.entries()) {
      await client.query("insert into contact_details (brand_id, position, type, value) values ($1, $2, $3, $4)", [
        brandId,
        position,
        contact.type,
        contact.value
      ]);
    }
    for (const [position, link] of insights.important_links.entries()) {
      await client.query("insert into important_links (brand_id, position, name, url) values ($1, $2, $3, $4)", [
        brandId,
        position,
        link.name,
        link.url
      ]);
    }
  }

  async getBrandInsights(baseUrl: string, query: InsightsQuery): Promise<BrandInsights | null> {
    if (!this.pool) {
      return null;
    }

    const brandResult = await this.pool.query<{ id: number; brand_text: string | null }>(
      "select id, brand_text from brands where url = $1 limit 1",
      [baseUrl]
    );
    const brand = brandResult.rows[0];
    if (!brand) {
      return null;
    }

    const productLimit = Math.max(1, Math.min(query.limit, 1000));
    const faqLimit = Math.max(1, Math.min(query.faq_limit, 1000));
    const productTitle = query.product_title?.trim() ? likePattern(query.product_title.trim()) : null;
    const faqText = query.faq_query?.trim() ? likePattern(query.faq_query.trim()) : null;

    const [products, heroProducts, policies, faqs, socialHandles, contactDetails, importantLinks] = await Promise.all([
      this.pool.query(
        `
        select shopify_id as id, title, url, image, price, description
        from products
        where brand_id = $1 and ($2::text is null or title ilike $2)
        order by position asc
        limit $3
        offset $4
        `,
        [brand.id, productTitle, productLimit, Math.max(0, query.offset)]
      ),
      this.pool.query(
        `
        select null::text as id, title, url, image, price, description
        from hero_products
        where brand_id = $1
        order by position asc
        `,
        [brand.id]
      ),
      this.pool.query("select type, url, content from policies where brand_id = $1 order by position asc", [brand.id]),
      this.pool.query(
        `
        select question, answer
        from faqs
        where brand_id = $1 and ($2::text is null or question ilike $2 or answer ilike $2)
        order by position asc
        limit $3
        offset $4
        `,
        [brand.id, faqText, faqLimit, Math.max(0, query.faq_offset)]
      ),
      this.pool.query("select platform, url from social_handles where brand_id = $1 order by position asc", [brand.id]),
      this.pool.query("select type, value from contact_details where brand_id = $1 order by position asc", [brand.id]),
      this.pool.query("select name, url from important_links where brand_id = $1 order by position asc", [brand.id])
    ]);

    return BrandInsightsSchema.parse({
      product_catalog: products.rows,
      hero_products: heroProducts.rows,
      policies: policies.rows,
      faqs: faqs.rows,
      social_handles: socialHandles.rows,
      contact_details: contactDetails.rows,
      brand_text: brand.brand_text,
      important_links: importantLinks.rows
    });
  }

  async close(): Promise<void> {
    await this.pool?.end();
  }
}
