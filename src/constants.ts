export default {
    S3: {
        KEY_PATH: "scripts",
        BUCKET_SUFFIX: "-aws-parallelcluster",
        OBJECT_ACL: "public-read",
        ROLLBACK_MAX_VERSIONS: 3,
    },
    PARTITIONS: {
        commercial: "us-east-1",
        govcloud: "us-gov-west-1",
        china: "cn-north-1",
    },
    STS: {
        ROLE_SESSION_NAME: "upload-script-session",
    },
} as const;
