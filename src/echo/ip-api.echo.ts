import { z } from 'zod';
import { Echo, type EchoResponse } from '~/echo/Echo';
import { ProbeResponseError } from '~/proxy_checker/errors';

const IpApiResponseSchema = z.object({
    query: z.string().nullish(),
    country: z.string().nullish(),
    city: z.string().nullish(),
});

type IpApiResponse = z.infer<typeof IpApiResponseSchema>;

// http://ip-api.com/json/ and anything answering in its shape.
export class IpApiEcho extends Echo {
    public parse(body: string): EchoResponse {
        const parsed = IpApiResponseSchema.safeParse(JSON.parse(body));

        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${ i.path.join('.') || 'body' }: ${ i.message }`);

            throw new ProbeResponseError(issues.join('; '));
        }

        return Mapper.toEchoResponse(parsed.data);
    }
}

class Mapper {
    public static toEchoResponse(echo: IpApiResponse): EchoResponse {
        return {
            ip_address: echo.query ?? null,
            country: echo.country ?? null,
            city: echo.city ?? null,
        };
    }
}
